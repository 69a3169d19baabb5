import { ShareError } from "../utils/errors";
import type { UploadProgress, UploadStatus } from "../models/share.model";

interface ProgressEntry extends UploadProgress {
  evictAt: number | null;
}

export const DEFAULT_RETENTION_MS = 5 * 60 * 1000;

/**
 * In-memory upload progress keyed by upload id. Each upload owns its entry;
 * terminal entries are evicted lazily on read and by `prune()`, which the
 * eviction timer and the sweeper both call.
 */
export class ProgressStore {
  private entries = new Map<string, ProgressEntry>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly retentionMs: number = DEFAULT_RETENTION_MS,
    private readonly now: () => number = Date.now,
  ) {}

  begin(uploadId: string, total: number): UploadProgress {
    this.evictIfDue(uploadId);
    if (this.entries.has(uploadId)) {
      throw new ShareError("invalid_request", "Upload id already in use");
    }
    const entry: ProgressEntry = {
      uploadId,
      total: Math.max(0, total),
      uploaded: 0,
      status: "starting",
      evictAt: null,
    };
    this.entries.set(uploadId, entry);
    return this.snapshot(entry);
  }

  advance(uploadId: string, bytes: number): void {
    const entry = this.entries.get(uploadId);
    if (!entry || entry.evictAt !== null || bytes <= 0) return;
    entry.uploaded += bytes;
    entry.status = "uploading";
  }

  complete(uploadId: string): void {
    this.finish(uploadId, "completed");
  }

  fail(uploadId: string): void {
    this.finish(uploadId, "failed");
  }

  get(uploadId: string): UploadProgress | null {
    this.evictIfDue(uploadId);
    const entry = this.entries.get(uploadId);
    return entry ? this.snapshot(entry) : null;
  }

  prune(): number {
    let removed = 0;
    for (const id of [...this.entries.keys()]) {
      if (this.evictIfDue(id)) removed++;
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  startEviction(intervalMs: number = this.retentionMs): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.prune(), intervalMs);
    this.timer.unref();
  }

  stopEviction(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private finish(uploadId: string, status: UploadStatus): void {
    const entry = this.entries.get(uploadId);
    if (!entry || entry.evictAt !== null) return;
    entry.status = status;
    if (status === "completed") {
      entry.total = entry.uploaded;
    }
    entry.evictAt = this.now() + this.retentionMs;
  }

  private evictIfDue(uploadId: string): boolean {
    const entry = this.entries.get(uploadId);
    if (entry && entry.evictAt !== null && entry.evictAt <= this.now()) {
      this.entries.delete(uploadId);
      return true;
    }
    return false;
  }

  private snapshot(entry: ProgressEntry): UploadProgress {
    return {
      uploadId: entry.uploadId,
      total: entry.total,
      uploaded: entry.uploaded,
      status: entry.status,
    };
  }
}
