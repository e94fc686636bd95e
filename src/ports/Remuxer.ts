export interface Remuxer {
  /**
   * Repackages `inputPath` into the container implied by `outputPath` without
   * re-encoding. Rejects with RemuxError; never crashes the process.
   */
  remux(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
}
