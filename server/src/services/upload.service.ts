import { Transform } from "stream";
import type { Readable, TransformCallback } from "stream";
import { pipeline } from "stream/promises";
import logger from "../utils/logger";
import { ShareError, errorCategory } from "../utils/errors";
import { sanitizeFilename } from "../utils/sanitizer";
import type { ShareRegistry } from "./registry.service";
import type { StorageService } from "./storage.service";
import type { ProgressStore } from "./progress.service";
import {
  SHARE_LIMITS,
  type PublishOptions,
  type ShareRecord,
  type StagedUpload,
} from "../models/share.model";

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface UploadServiceOptions {
  maxFileSize: number;
  chunkSize?: number;
  now?: () => Date;
}

export interface UploadInput extends PublishOptions {
  uploadId: string;
  source: Readable;
  declaredLength?: number;
}

function formatMiB(bytes: number): string {
  return `${Math.round(bytes / (1024 * 1024))}MB`;
}

export class UploadService {
  private readonly maxFileSize: number;
  private readonly chunkSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly registry: ShareRegistry,
    private readonly storage: StorageService,
    private readonly progress: ProgressStore,
    options: UploadServiceOptions,
  ) {
    this.maxFileSize = options.maxFileSize;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  async upload(input: UploadInput): Promise<ShareRecord> {
    const staged = await this.receive(
      input.uploadId,
      input.source,
      input.declaredLength,
    );
    return this.publish(staged, input);
  }

  /**
   * Streams `source` into a staging file while enforcing the size ceiling.
   * On any failure the staging file is removed and the progress entry is
   * marked failed before the error propagates.
   */
  async receive(
    uploadId: string,
    source: Readable,
    declaredLength?: number,
  ): Promise<StagedUpload> {
    this.progress.begin(uploadId, declaredLength ?? 0);

    if (declaredLength !== undefined && declaredLength > this.maxFileSize) {
      this.progress.fail(uploadId);
      throw this.tooLarge();
    }

    const target = this.storage.stagingPath(uploadId);
    let received = 0;

    const meter = new Transform({
      transform: (chunk: Buffer, _encoding, callback: TransformCallback) => {
        received += chunk.length;
        if (received > this.maxFileSize) {
          callback(this.tooLarge());
          return;
        }
        this.progress.advance(uploadId, chunk.length);
        callback(null, chunk);
      },
    });

    try {
      await pipeline(
        source,
        meter,
        this.storage.createWriteStream(target, this.chunkSize),
      );
    } catch (error) {
      logger.warn(`Upload ${uploadId} aborted`, {
        reason: errorCategory(error),
        received,
      });
      await this.discardFile(uploadId, target);
      throw error;
    }

    logger.debug(`Upload ${uploadId} received`, { size: received });
    return { uploadId, path: target, size: received };
  }

  /** Turns a staged upload into a share: record first, then the final file name. */
  async publish(
    staged: StagedUpload,
    options: PublishOptions,
  ): Promise<ShareRecord> {
    let record: ShareRecord | null = null;

    try {
      this.assertLimits(options);
      record = await this.registry.create(
        {
          filename: sanitizeFilename(options.filename),
          ttlMs: options.expirationDays * DAY_MS,
          maxDownloads: options.maxDownloads,
          size: staged.size,
        },
        this.now(),
      );
      await this.storage.move(
        staged.path,
        this.storage.sharePath(record.token, record.filename),
      );
    } catch (error) {
      if (record) {
        await this.withdraw(record);
      }
      await this.discardFile(staged.uploadId, staged.path);
      throw error;
    }

    this.progress.complete(staged.uploadId);
    logger.info(`Share created for upload ${staged.uploadId}`, {
      id: record.id,
      size: record.size,
      expiresAt: record.expiresAt.toISOString(),
      maxDownloads: record.maxDownloads,
    });
    return record;
  }

  async discard(staged: StagedUpload): Promise<void> {
    await this.discardFile(staged.uploadId, staged.path);
  }

  private assertLimits(options: PublishOptions): void {
    const { expirationDays, maxDownloads } = options;
    if (
      !Number.isInteger(expirationDays) ||
      expirationDays < SHARE_LIMITS.minExpirationDays ||
      expirationDays > SHARE_LIMITS.maxExpirationDays
    ) {
      throw new ShareError(
        "invalid_request",
        `expiration_days must be between ${SHARE_LIMITS.minExpirationDays} and ${SHARE_LIMITS.maxExpirationDays}`,
      );
    }
    if (
      maxDownloads !== null &&
      (!Number.isInteger(maxDownloads) ||
        maxDownloads < SHARE_LIMITS.minDownloads ||
        maxDownloads > SHARE_LIMITS.maxDownloads)
    ) {
      throw new ShareError(
        "invalid_request",
        `max_downloads must be between ${SHARE_LIMITS.minDownloads} and ${SHARE_LIMITS.maxDownloads}`,
      );
    }
  }

  private tooLarge(): ShareError {
    return new ShareError(
      "too_large",
      `File too large. Maximum size: ${formatMiB(this.maxFileSize)}`,
    );
  }

  private async discardFile(uploadId: string, filePath: string): Promise<void> {
    this.progress.fail(uploadId);
    try {
      await this.storage.remove(filePath);
    } catch (error) {
      logger.error(`Could not remove partial file for upload ${uploadId}`, {
        category: errorCategory(error),
      });
      throw error;
    }
  }

  private async withdraw(record: ShareRecord): Promise<void> {
    try {
      await this.registry.deleteById(record.id);
    } catch (error) {
      logger.error(`Could not withdraw share ${record.id}`, {
        category: errorCategory(error),
      });
    }
  }
}
