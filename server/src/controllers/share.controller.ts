import type { Request, Response } from "express";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";
import busboy from "busboy";
import Joi from "joi";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { ShareError, errorCategory, isShareError } from "../utils/errors";
import { isWellFormedToken } from "../utils/token";
import { isAuthenticated } from "../middleware/auth.middleware";
import type { AppConfig } from "../config";
import type { UploadService } from "../services/upload.service";
import type {
  DownloadService,
  DownloadTicket,
} from "../services/download.service";
import type { ShareService } from "../services/share.service";
import type { ProgressStore } from "../services/progress.service";
import {
  SHARE_LIMITS,
  type ShareRecord,
  type StagedUpload,
} from "../models/share.model";

// Multipart boundaries and the small form fields ride on top of the file bytes.
const FORM_OVERHEAD_BYTES = 64 * 1024;

// Validation schemas
const uploadQuerySchema = Joi.object({
  upload_id: Joi.string().uuid().optional(),
});

const uploadFormSchema = Joi.object({
  max_downloads: Joi.number()
    .integer()
    .min(SHARE_LIMITS.minDownloads)
    .max(SHARE_LIMITS.maxDownloads)
    .empty("")
    .allow(null)
    .default(null),
  expiration_days: Joi.number()
    .integer()
    .min(SHARE_LIMITS.minExpirationDays)
    .max(SHARE_LIMITS.maxExpirationDays)
    .empty("")
    .default(1),
  size: Joi.number().integer().min(0).empty("").optional(),
});

const uploadIdSchema = Joi.string().uuid().required();
const shareIdSchema = Joi.number().integer().positive().required();

interface UploadForm {
  max_downloads: number | null;
  expiration_days: number;
}

interface ReceivedForm {
  fields: Record<string, string>;
  filename: string;
  staged: StagedUpload;
}

export interface ShareControllerDeps {
  config: Pick<
    AppConfig,
    "maxFileSize" | "apiKey" | "publicBaseUrl" | "title" | "subtitle"
  >;
  uploads: UploadService;
  downloads: DownloadService;
  shares: ShareService;
  progress: ProgressStore;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (isShareError(error) && error.code !== "internal") {
    res.status(error.status).json({ error: error.code, message: error.message });
    return;
  }

  logger.error(`Error in ${context} controller`, {
    category: errorCategory(error),
  });
  res.status(500).json({ error: "internal", message: "Internal server error" });
}

function parseDeclaredSize(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const size = Number(value);
  return Number.isSafeInteger(size) && size >= 0 ? size : undefined;
}

function toListItem(record: ShareRecord) {
  return {
    id: record.id,
    filename: record.filename,
    share_id: record.token,
    size: record.size,
    expires_at: record.expiresAt.toISOString(),
    max_downloads: record.maxDownloads,
    download_count: record.downloadCount,
  };
}

export function createShareController(deps: ShareControllerDeps) {
  const { config, uploads, downloads, shares, progress } = deps;

  function shareUrl(req: Request, token: string): string {
    const base = config.publicBaseUrl ?? `${req.protocol}://${req.get("host")}`;
    return `${base}/share/${token}`;
  }

  /**
   * Streams the multipart body. The file part goes straight into the upload
   * pipeline; fields are collected on the side because browsers may send
   * them after the file. Rejects as soon as the pipeline fails.
   */
  function receiveForm(req: Request, uploadId: string): Promise<ReceivedForm> {
    return new Promise((resolve, reject) => {
      let bb: busboy.Busboy;
      try {
        bb = busboy({
          headers: req.headers,
          limits: { files: 1, fields: 10, fieldSize: 1024 },
        });
      } catch (error) {
        reject(new ShareError("invalid_request", "Expected multipart form data"));
        return;
      }

      const fields: Record<string, string> = {};
      let filename = "";
      let activeFile: Readable | null = null;
      let receiving: Promise<StagedUpload> | null = null;
      let settled = false;

      const fail = (error: unknown) => {
        if (settled) return;
        settled = true;
        req.unpipe(bb);
        req.resume();
        activeFile?.destroy(
          error instanceof Error ? error : new Error("Upload aborted"),
        );
        if (receiving) {
          // A rejected receive has already removed its own partial file.
          receiving
            .then(
              (staged) => uploads.discard(staged),
              () => undefined,
            )
            .catch((discardError: unknown) => {
              logger.error(`Could not discard upload ${uploadId}`, {
                category: errorCategory(discardError),
              });
            });
        }
        reject(error);
      };

      bb.on("field", (name, value) => {
        fields[name] = value;
      });

      bb.on("file", (name, file, info) => {
        if (name !== "file" || receiving) {
          file.resume();
          return;
        }
        filename = info.filename ?? "";
        activeFile = file;
        receiving = uploads.receive(
          uploadId,
          file,
          parseDeclaredSize(fields.size),
        );
        receiving.catch(fail);
      });

      bb.on("error", fail);

      bb.on("close", () => {
        if (settled) return;
        if (!receiving) {
          fail(new ShareError("invalid_request", "No file"));
          return;
        }
        receiving.then((staged) => {
          if (settled) return;
          settled = true;
          resolve({ fields, filename, staged });
        }, fail);
      });

      req.on("close", () => {
        if (!req.complete) {
          fail(new Error("Client aborted upload"));
        }
      });

      req.pipe(bb);
    });
  }

  async function createShare(req: Request, res: Response): Promise<void> {
    try {
      const { error: queryError, value: query } = uploadQuerySchema.validate(
        req.query,
      );
      if (queryError) {
        res.status(400).json({
          error: "invalid_request",
          message: queryError.message,
        });
        return;
      }

      const uploadId: string = query.upload_id ?? uuidv4();

      const contentLength = Number(req.headers["content-length"]);
      if (
        Number.isFinite(contentLength) &&
        contentLength > config.maxFileSize + FORM_OVERHEAD_BYTES
      ) {
        req.resume();
        res.setHeader("Connection", "close");
        sendError(
          res,
          new ShareError(
            "too_large",
            `File too large. Maximum size: ${Math.round(config.maxFileSize / (1024 * 1024))}MB`,
          ),
          "createShare",
        );
        return;
      }

      let received: ReceivedForm;
      try {
        received = await receiveForm(req, uploadId);
      } catch (error) {
        if (isShareError(error) && error.code === "too_large") {
          res.setHeader("Connection", "close");
        }
        sendError(res, error, "createShare");
        return;
      }

      const { error: formError, value } = uploadFormSchema.validate(
        received.fields,
        { stripUnknown: true },
      );
      if (formError) {
        await uploads.discard(received.staged);
        res.status(400).json({
          error: "invalid_request",
          message: formError.message,
        });
        return;
      }

      const form: UploadForm = value;
      const record = await uploads.publish(received.staged, {
        filename: received.filename,
        expirationDays: form.expiration_days,
        maxDownloads: form.max_downloads,
      });

      res.status(200).json({
        id: record.id,
        token: record.token,
        url: shareUrl(req, record.token),
        upload_id: uploadId,
        expires_at: record.expiresAt.toISOString(),
        max_downloads: record.maxDownloads,
      });
    } catch (error) {
      sendError(res, error, "createShare");
    }
  }

  async function getUploadProgress(req: Request, res: Response): Promise<void> {
    const { uploadId } = req.params;

    const { error } = uploadIdSchema.validate(uploadId);
    if (error) {
      res.status(400).json({ error: "invalid_request", message: error.message });
      return;
    }

    const entry = progress.get(uploadId);
    if (!entry) {
      res.status(404).json({ error: "not_found", message: "Upload not found" });
      return;
    }

    res.status(200).json({
      total: entry.total,
      uploaded: entry.uploaded,
      status: entry.status,
    });
  }

  async function listShares(req: Request, res: Response): Promise<void> {
    try {
      const records = await shares.listActive();
      res.status(200).json(records.map(toListItem));
    } catch (error) {
      sendError(res, error, "listShares");
    }
  }

  async function deleteShare(req: Request, res: Response): Promise<void> {
    try {
      const { error, value } = shareIdSchema.validate(req.params.id);
      if (error || value === undefined) {
        res.status(400).json({
          error: "invalid_request",
          message: error ? error.message : "Invalid id",
        });
        return;
      }

      await shares.deleteShare(value);
      res.status(200).json({ ok: true });
    } catch (error) {
      sendError(res, error, "deleteShare");
    }
  }

  async function fetchShare(req: Request, res: Response): Promise<void> {
    const { token } = req.params;

    if (!isWellFormedToken(token)) {
      res.status(404).json({ error: "not_found", message: "Not found" });
      return;
    }

    let ticket: DownloadTicket;
    try {
      ticket = await downloads.open(token);
    } catch (error) {
      sendError(res, error, "fetchShare");
      return;
    }

    res.status(200);
    res.attachment(ticket.record.filename);
    res.setHeader("Content-Length", String(ticket.size));
    res.setHeader("Cache-Control", "no-store");

    try {
      await pipeline(ticket.stream, res);
    } catch (error) {
      logger.warn(`Download of share ${ticket.record.id} interrupted`, {
        category: errorCategory(error),
      });
    } finally {
      await ticket.complete();
    }
  }

  /** Answers HEAD with the download headers; never counts a download. */
  async function headShare(req: Request, res: Response): Promise<void> {
    const { token } = req.params;

    if (!isWellFormedToken(token)) {
      res.status(404).end();
      return;
    }

    try {
      const head = await downloads.inspect(token);
      res.status(200);
      res.attachment(head.record.filename);
      res.setHeader("Content-Length", String(head.size));
      res.setHeader("Cache-Control", "no-store");
      res.end();
    } catch (error) {
      sendError(res, error, "headShare");
    }
  }

  async function getConfig(req: Request, res: Response): Promise<void> {
    res.status(200).json({
      title: config.title,
      subtitle: config.subtitle,
      max_file_size: config.maxFileSize,
    });
  }

  async function me(req: Request, res: Response): Promise<void> {
    res.status(200).json({ authenticated: isAuthenticated(req, config.apiKey) });
  }

  async function healthCheck(req: Request, res: Response): Promise<void> {
    res
      .status(200)
      .json({ status: "healthy", timestamp: new Date().toISOString() });
  }

  return {
    createShare,
    getUploadProgress,
    listShares,
    deleteShare,
    fetchShare,
    headShare,
    getConfig,
    me,
    healthCheck,
  };
}
