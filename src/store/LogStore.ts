import { appendFile, mkdir, rename, stat } from "node:fs/promises";
import path from "node:path";
import { compactUtcStamp } from "../utils/timestamps.js";

export type LogCategory = "application" | "runtime" | "database";

export const LOG_CATEGORIES: readonly LogCategory[] = [
  "application",
  "runtime",
  "database",
];

export const DEFAULT_LOG_FILES: Record<LogCategory, string> = {
  application: "app_errors.log",
  runtime: "runtime_errors.log",
  database: "database_errors.log",
};

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

export interface LogStoreOptions {
  directory: string;
  files?: Partial<Record<LogCategory, string>>;
  /** Rotation ceiling in bytes; the active file rotates once it is larger. */
  maxFileSize?: number;
  now?: () => Date;
  onRotate?(category: LogCategory, rotatedPath: string): void;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Append-only, size-bounded text log with one active file per category.
 *
 * Every mutation of a category (rotate check, rotation, append) runs inside
 * that category's lock, so entries are totally ordered and never interleave.
 * The lock is per process: one store instance should own a directory.
 */
export class LogStore {
  private readonly directory: string;
  private readonly files: Record<LogCategory, string>;
  private readonly maxFileSize: number;
  private readonly now: () => Date;
  private readonly onRotate?: LogStoreOptions["onRotate"];
  private readonly locks = new Map<LogCategory, Promise<void>>();
  private directoryReady: Promise<void> | null = null;

  constructor(options: LogStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.files = { ...DEFAULT_LOG_FILES, ...options.files };
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.now = options.now ?? (() => new Date());
    this.onRotate = options.onRotate;
  }

  pathFor(category: LogCategory): string {
    return path.resolve(this.directory, this.files[category]);
  }

  /**
   * Appends one fully formatted entry, rotating the active file first when it
   * has outgrown the ceiling.
   */
  append(category: LogCategory, entry: string): Promise<void> {
    return this.withLock(category, async () => {
      await this.ensureDirectory();
      await this.rotateUnlocked(category);
      await appendFile(this.pathFor(category), entry, "utf8");
    });
  }

  /**
   * Rotates the category's active file when it exceeds the ceiling.
   * @returns The rotated file's path, or `null` when no rotation happened.
   */
  rotateIfOversize(category: LogCategory): Promise<string | null> {
    return this.withLock(category, () => this.rotateUnlocked(category));
  }

  private async rotateUnlocked(category: LogCategory): Promise<string | null> {
    const activePath = this.pathFor(category);

    let size: number;
    try {
      size = (await stat(activePath)).size;
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    if (size <= this.maxFileSize) return null;

    const rotatedPath = await this.nextRotatedPath(activePath);
    await rename(activePath, rotatedPath);
    this.onRotate?.(category, rotatedPath);
    return rotatedPath;
  }

  private async nextRotatedPath(activePath: string): Promise<string> {
    const stamp = compactUtcStamp(this.now());
    for (let attempt = 0; ; attempt += 1) {
      const suffix = attempt === 0 ? "" : `-${attempt}`;
      const candidate = `${activePath}.${stamp}${suffix}.old`;
      try {
        await stat(candidate);
      } catch (error) {
        if (isMissingFile(error)) return candidate;
        throw error;
      }
    }
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = null;
          throw error;
        },
      );
    }
    return this.directoryReady;
  }

  private withLock<T>(category: LogCategory, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(category) ?? Promise.resolve();
    const run = previous.then(task);
    this.locks.set(
      category,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }
}
