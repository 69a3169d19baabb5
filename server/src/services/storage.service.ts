import fs from "fs";
import path from "path";
import logger from "../utils/logger";

const STAGING_SUFFIX = ".part";

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Backing files live flat in one upload directory as `{token}-{filename}`.
 * In-flight uploads are written to hidden `.{uploadId}.part` staging files
 * and renamed once their share record exists.
 */
export class StorageService {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async ensureDirectory(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    logger.info(`Upload directory ready: ${this.directory}`);
  }

  sharePath(token: string, filename: string): string {
    return path.join(this.directory, `${token}-${filename}`);
  }

  stagingPath(uploadId: string): string {
    return path.join(this.directory, `.${uploadId}${STAGING_SUFFIX}`);
  }

  createWriteStream(filePath: string, chunkSize: number): fs.WriteStream {
    return fs.createWriteStream(filePath, { flags: "wx", highWaterMark: chunkSize });
  }

  /** Opens a file for reading, or returns null when it does not exist. */
  async openForRead(filePath: string): Promise<fs.promises.FileHandle | null> {
    try {
      return await fs.promises.open(filePath, "r");
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async move(from: string, to: string): Promise<void> {
    await fs.promises.rename(from, to);
  }

  /** Deletes a file. Returns false when it was already gone. */
  async remove(filePath: string): Promise<boolean> {
    try {
      await fs.promises.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /**
   * Removes staging files left by a previous process. Only safe before the
   * server starts accepting uploads.
   */
  async purgeStaging(): Promise<number> {
    const entries = await fs.promises.readdir(this.directory);
    let removed = 0;
    for (const entry of entries) {
      if (entry.startsWith(".") && entry.endsWith(STAGING_SUFFIX)) {
        if (await this.remove(path.join(this.directory, entry))) removed++;
      }
    }
    if (removed > 0) {
      logger.info(`Removed ${removed} leftover staging file(s)`);
    }
    return removed;
  }
}
