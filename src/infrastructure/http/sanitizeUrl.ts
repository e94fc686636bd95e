/**
 * URL safe for logs: origin and path only. Query strings often carry signed
 * tokens and userinfo carries credentials.
 */
export const sanitizeUrl = (raw: string): string => {
  try {
    const url = new URL(raw);
    return `${url.origin}${url.pathname}`;
  } catch {
    return "<invalid url>";
  }
};
