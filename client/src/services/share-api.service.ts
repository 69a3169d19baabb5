import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import axios from "axios";
import type { AxiosInstance } from "axios";
import logger from "../utils/logger";

export interface ShareSummary {
  id: number;
  filename: string;
  share_id: string;
  size: number;
  expires_at: string;
  max_downloads: number | null;
  download_count: number;
}

const REFUSALS: Record<number, string> = {
  401: "Authentication required",
  404: "Share not found",
  410: "Share expired or download limit reached",
};

function decodeExtended(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    logger.debug("Ignoring malformed filename* parameter", {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Filename from a Content-Disposition header. The RFC 5987 `filename*`
 * form wins over the plain `filename`, which holds `?` for non-ASCII names.
 */
export function filenameFromDisposition(header: unknown): string | null {
  if (typeof header !== "string") return null;

  const extended = /filename\*=UTF-8''([^;\s]+)/i.exec(header);
  const decoded = extended && extended[1] ? decodeExtended(extended[1]) : null;
  if (decoded) return path.basename(decoded);

  const match = /filename="([^"]*)"/i.exec(header);
  return match && match[1] ? path.basename(match[1]) : null;
}

export class ShareApiService {
  constructor(private readonly http: AxiosInstance) {}

  async list(): Promise<ShareSummary[]> {
    const response = await this.http.get<ShareSummary[]>("/api/files");
    return response.data;
  }

  async remove(id: number): Promise<void> {
    try {
      await this.http.delete(`/api/files/${id}`);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new Error(`Share ${id} not found`);
      }
      throw error;
    }
  }

  /**
   * Downloads a share into `outDir` (or to `outPath` when given) and returns
   * the written path. A failed transfer leaves no partial file behind.
   */
  async download(
    token: string,
    target: { outDir?: string; outPath?: string } = {},
  ): Promise<string> {
    const response = await this.http.get(`/share/${encodeURIComponent(token)}`, {
      responseType: "stream",
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      response.data.resume();
      throw new Error(
        REFUSALS[response.status] ?? `Server answered ${response.status}`,
      );
    }

    const filename =
      filenameFromDisposition(response.headers["content-disposition"]) ?? token;
    const outPath =
      target.outPath ?? path.join(target.outDir ?? process.cwd(), filename);

    try {
      await pipeline(response.data, fs.createWriteStream(outPath));
    } catch (error) {
      await fs.promises.rm(outPath, { force: true });
      throw error;
    }

    logger.info(`Saved ${filename} to ${outPath}`);
    return outPath;
  }
}
