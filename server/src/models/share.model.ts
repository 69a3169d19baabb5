export interface ShareRecord {
  id: number;
  filename: string;
  token: string;
  size: number;
  expiresAt: Date;
  maxDownloads: number | null;
  downloadCount: number;
  createdAt: Date;
}

export interface CreateShareInput {
  filename: string;
  ttlMs: number;
  maxDownloads: number | null;
  size: number;
}

/**
 * Result of one download attempt against the registry.
 * - continuing: counter incremented, share still live
 * - last_download: counter reached the cap, record deleted in the same transaction
 * - limit_reached: record is null when only the exhausted-token marker remains
 */
export type DownloadOutcome =
  | { status: "not_found" }
  | { status: "expired"; record: ShareRecord }
  | { status: "limit_reached"; record: ShareRecord | null }
  | { status: "continuing"; record: ShareRecord }
  | { status: "last_download"; record: ShareRecord };

export type UploadStatus = "starting" | "uploading" | "completed" | "failed";

export interface UploadProgress {
  uploadId: string;
  total: number;
  uploaded: number;
  status: UploadStatus;
}

export interface PublishOptions {
  filename: string;
  expirationDays: number;
  maxDownloads: number | null;
}

export interface StagedUpload {
  uploadId: string;
  path: string;
  size: number;
}

export const SHARE_LIMITS = {
  minExpirationDays: 1,
  maxExpirationDays: 30,
  minDownloads: 1,
  maxDownloads: 1000,
} as const;
