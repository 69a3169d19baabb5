import type { Readable } from "stream";
import logger from "../utils/logger";
import { ShareError, errorCategory } from "../utils/errors";
import type { ShareRegistry } from "./registry.service";
import type { StorageService } from "./storage.service";
import type { DownloadOutcome, ShareRecord } from "../models/share.model";

export interface ShareHead {
  record: ShareRecord;
  size: number;
}

export interface DownloadTicket {
  record: ShareRecord;
  size: number;
  stream: Readable;
  /** True when this download consumed the last allowed slot. */
  lastDownload: boolean;
  /**
   * Must be called once the response has finished (or failed). Deletes the
   * backing file when this was the last allowed download.
   */
  complete(): Promise<void>;
}

type Refusal = Exclude<
  DownloadOutcome,
  { status: "continuing" } | { status: "last_download" }
>;

function rejection(outcome: Refusal): ShareError {
  switch (outcome.status) {
    case "not_found":
      return new ShareError("not_found", "Not found");
    case "expired":
      return new ShareError("expired", "Expired");
    case "limit_reached":
      return new ShareError("limit_reached", "Limit reached");
  }
}

/**
 * Enforces expiry and download caps for share links.
 *
 * Expired and exhausted shares are refused without touching the record;
 * the sweeper reclaims them. The backing file is opened before the
 * download is counted, so a missing file costs nothing, and the open handle
 * keeps the bytes readable even if the file is unlinked mid-transfer.
 */
export class DownloadService {
  constructor(
    private readonly registry: ShareRegistry,
    private readonly storage: StorageService,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Runs the same checks as `open` and reports the file size without
   * counting a download. Backs HEAD requests.
   */
  async inspect(token: string): Promise<ShareHead> {
    const record = await this.admit(token, this.now());
    const handle = await this.storage.openForRead(
      this.storage.sharePath(record.token, record.filename),
    );
    if (!handle) {
      throw new ShareError("not_found", "File missing");
    }
    try {
      return { record, size: (await handle.stat()).size };
    } finally {
      await handle.close();
    }
  }

  async open(token: string): Promise<DownloadTicket> {
    const now = this.now();
    const record = await this.admit(token, now);

    const filePath = this.storage.sharePath(record.token, record.filename);
    const handle = await this.storage.openForRead(filePath);
    if (!handle) {
      logger.warn(`Backing file missing for share ${record.id}`);
      throw new ShareError("not_found", "File missing");
    }

    let outcome: DownloadOutcome;
    let size: number;
    try {
      size = (await handle.stat()).size;
      outcome = await this.registry.incrementAndMaybeDelete(token, now);
    } catch (error) {
      await handle.close();
      throw error;
    }

    if (
      outcome.status !== "continuing" &&
      outcome.status !== "last_download"
    ) {
      await handle.close();
      throw rejection(outcome);
    }

    const lastDownload = outcome.status === "last_download";
    const counted = outcome.record;
    logger.info(`Serving share ${counted.id}`, {
      downloadCount: counted.downloadCount,
      maxDownloads: counted.maxDownloads,
      lastDownload,
    });

    let completed = false;
    return {
      record: counted,
      size,
      stream: handle.createReadStream(),
      lastDownload,
      complete: async () => {
        if (completed || !lastDownload) return;
        completed = true;
        await this.deleteFile(counted, filePath);
      },
    };
  }

  private async admit(token: string, now: Date): Promise<ShareRecord> {
    const record = await this.registry.get(token);

    if (!record) {
      if (await this.registry.wasExhausted(token, now)) {
        throw new ShareError("limit_reached", "Limit reached");
      }
      throw new ShareError("not_found", "Not found");
    }
    if (now.getTime() >= record.expiresAt.getTime()) {
      throw new ShareError("expired", "Expired");
    }
    if (
      record.maxDownloads !== null &&
      record.downloadCount >= record.maxDownloads
    ) {
      throw new ShareError("limit_reached", "Limit reached");
    }
    return record;
  }

  private async deleteFile(record: ShareRecord, filePath: string): Promise<void> {
    try {
      await this.storage.remove(filePath);
      logger.info(`Removed file of exhausted share ${record.id}`);
    } catch (error) {
      // The record is already gone; the sweeper cannot find this file again.
      logger.error(`Could not remove file of exhausted share ${record.id}`, {
        category: errorCategory(error),
      });
    }
  }
}
