import fs from "fs";
import path from "path";
import axios from "axios";
import type { AxiosInstance } from "axios";
import FormData from "form-data";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { serverMessage } from "./http";

export interface UploadOptions {
  maxDownloads?: number;
  expirationDays?: number;
  onProgress?: (progress: UploadProgress) => void;
}

export interface UploadProgress {
  total: number;
  uploaded: number;
  status: "starting" | "uploading" | "completed" | "failed";
}

export interface UploadResult {
  id: number;
  token: string;
  url: string;
  upload_id: string;
  expires_at: string;
  max_downloads: number | null;
}

export interface UploaderOptions {
  maxRetries?: number;
  baseDelay?: number;
  pollInterval?: number;
}

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  // No answer at all, or the server failed; a 4xx will not change on retry.
  return !error.response || error.response.status >= 500;
}

function describe(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const message = error.response ? serverMessage(error.response.data) : null;
    if (message) return message;
    if (error.response) return `Server answered ${error.response.status}`;
    return error.message;
  }
  return error instanceof Error ? error.message : "Unknown error";
}

export class UploaderService {
  private maxRetries: number;
  private baseDelay: number;
  private pollInterval: number;

  constructor(
    private readonly http: AxiosInstance,
    options: UploaderOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? 5;
    this.baseDelay = options.baseDelay ?? 1000; // 1 second
    this.pollInterval = options.pollInterval ?? 500;
  }

  async upload(
    filePath: string,
    options: UploadOptions = {},
  ): Promise<UploadResult> {
    // Verify file exists
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug(`Upload attempt ${attempt}/${this.maxRetries}`);
        return await this.uploadOnce(filePath, options);
      } catch (error) {
        lastError = error;
        if (!isRetryable(error)) {
          throw new Error(`Upload rejected: ${describe(error)}`);
        }
        logger.warn(`Upload attempt ${attempt} failed: ${describe(error)}`);

        if (attempt < this.maxRetries) {
          const delay = this.baseDelay * Math.pow(2, attempt - 1); // Exponential backoff
          logger.info(`Retrying in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw new Error(
      `Upload failed after ${this.maxRetries} attempts: ${describe(lastError)}`,
    );
  }

  private async uploadOnce(
    filePath: string,
    options: UploadOptions,
  ): Promise<UploadResult> {
    const size = fs.statSync(filePath).size;
    // Each attempt gets its own id; the server refuses to reuse one.
    const uploadId = uuidv4();

    const form = new FormData();
    form.append("expiration_days", String(options.expirationDays ?? 1));
    if (options.maxDownloads !== undefined) {
      form.append("max_downloads", String(options.maxDownloads));
    }
    form.append("size", String(size));
    form.append("file", fs.createReadStream(filePath), {
      filename: path.basename(filePath),
      knownLength: size,
    });

    logger.debug(`Uploading file (${size} bytes) as ${uploadId}`);

    const stopPolling = options.onProgress
      ? this.pollProgress(uploadId, options.onProgress)
      : () => undefined;

    try {
      const response = await this.http.post<UploadResult>("/api/upload", form, {
        params: { upload_id: uploadId },
        headers: form.getHeaders(),
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      });
      return response.data;
    } finally {
      stopPolling();
    }
  }

  private pollProgress(
    uploadId: string,
    onProgress: (progress: UploadProgress) => void,
  ): () => void {
    const timer = setInterval(() => {
      this.http
        .get<UploadProgress>(`/api/upload-progress/${uploadId}`)
        .then((response) => onProgress(response.data))
        .catch((error: unknown) => {
          // Not registered yet, or already finished; the next tick will tell.
          logger.debug(`Progress poll failed: ${describe(error)}`);
        });
    }, this.pollInterval);

    return () => clearInterval(timer);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
