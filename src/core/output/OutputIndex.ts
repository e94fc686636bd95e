import { promises as fs, type Dirent } from "fs";
import path from "path";
import { errorCode } from "../../shared/errors/errorCode";

/**
 * Containers the downloader can leave behind: remuxed output (mp4, mkv) and
 * raw segments.
 */
export const OUTPUT_EXTENSIONS = [".mp4", ".mkv", ".ts"] as const;

const toKey = (relativePath: string): string => relativePath.split(path.sep).join("/");

const withoutExtension = (key: string): string => {
  const ext = path.posix.extname(key);
  return ext === "" ? key : key.slice(0, -ext.length);
};

/**
 * Snapshot of the files present under the output directory when a run starts,
 * keyed by their path relative to that directory ("season-2/ep-1.mp4").
 * Never mutated after `build`, so concurrent reads need no locking.
 */
export class OutputIndex {
  private readonly keys: ReadonlySet<string>;

  private constructor(private readonly root: string, keys: Iterable<string>) {
    this.keys = new Set(keys);
  }

  static empty(): OutputIndex {
    return new OutputIndex(path.resolve("."), []);
  }

  static fromNames(root: string, relativePaths: Iterable<string>): OutputIndex {
    return new OutputIndex(path.resolve(root), Array.from(relativePaths, toKey));
  }

  /**
   * A missing directory is a first run and yields an empty index; any other
   * I/O error is rethrown.
   */
  static async build(directory: string): Promise<OutputIndex> {
    const root = path.resolve(directory);
    const keys: string[] = [];

    const walk = async (relativeDir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(path.join(root, relativeDir), { withFileTypes: true });
      } catch (err) {
        if (errorCode(err) === "ENOENT") return;
        throw err;
      }
      for (const entry of entries) {
        const relativePath = relativeDir === "" ? entry.name : path.join(relativeDir, entry.name);
        if (entry.isDirectory()) {
          await walk(relativePath);
        } else {
          keys.push(toKey(relativePath));
        }
      }
    };

    await walk("");
    return new OutputIndex(root, keys);
  }

  /** Index key of an output path, or undefined when it lies outside the indexed directory. */
  keyOf(outputPath: string): string | undefined {
    const relative = path.relative(this.root, path.resolve(outputPath));
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) return undefined;
    return toKey(relative);
  }

  get size(): number {
    return this.keys.size;
  }

  /**
   * True when the output itself, or the same logical name in the same
   * directory under any container the downloader produces, is indexed.
   */
  containsOutput(outputPath: string): boolean {
    const key = this.keyOf(outputPath);
    if (key === undefined) return false;
    return this.keys.has(key) || this.contains(withoutExtension(key));
  }

  contains(logicalKey: string): boolean {
    for (const ext of OUTPUT_EXTENSIONS) {
      if (this.keys.has(`${logicalKey}${ext}`)) return true;
    }
    return this.keys.has(logicalKey);
  }
}
