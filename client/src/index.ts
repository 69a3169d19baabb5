#!/usr/bin/env node
import dotenv from "dotenv";
import { createHttpClient } from "./services/http";
import { UploaderService } from "./services/uploader.service";
import { ShareApiService } from "./services/share-api.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const serverUrl = process.env.SERVER_URL || "http://localhost:8000";
const apiKey = process.env.SERVER_API_KEY || undefined;

const USAGE = [
  "Usage:",
  "  fileshare upload <path> [maxDownloads] [expirationDays]",
  "  fileshare list",
  "  fileshare delete <id>",
  "  fileshare download <token> [outPath]",
].join("\n");

function parseOptionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "" || value === "-") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer`);
  }
  return parsed;
}

async function runClient(argv: string[]): Promise<void> {
  const [command, ...args] = argv;
  const http = createHttpClient(serverUrl, apiKey);

  switch (command) {
    case "upload": {
      const [filePath, maxDownloads, expirationDays] = args;
      if (!filePath) throw new Error(USAGE);

      const uploader = new UploaderService(http);
      let lastPercent = -1;
      const result = await uploader.upload(filePath, {
        maxDownloads: parseOptionalInt(maxDownloads, "maxDownloads"),
        expirationDays: parseOptionalInt(expirationDays, "expirationDays"),
        onProgress: (progress) => {
          if (progress.total === 0) return;
          const percent = Math.round((progress.uploaded / progress.total) * 100);
          if (percent !== lastPercent) {
            lastPercent = percent;
            logger.info(`Uploading... ${percent}%`);
          }
        },
      });

      logger.info("Upload complete!");
      logger.info(`Share link: ${result.url}`);
      logger.info(
        `Expires at ${result.expires_at}` +
          (result.max_downloads ? `, max ${result.max_downloads} download(s)` : ""),
      );
      return;
    }

    case "list": {
      const shares = await new ShareApiService(http).list();
      if (shares.length === 0) {
        logger.info("No active shares");
        return;
      }
      for (const share of shares) {
        const limit = share.max_downloads ?? "∞";
        logger.info(
          `#${share.id} ${share.filename} ${share.download_count}/${limit} downloads, expires ${share.expires_at} (${share.share_id})`,
        );
      }
      return;
    }

    case "delete": {
      const id = parseOptionalInt(args[0], "id");
      if (id === undefined) throw new Error(USAGE);
      await new ShareApiService(http).remove(id);
      logger.info(`Share ${id} deleted`);
      return;
    }

    case "download": {
      const [token, outPath] = args;
      if (!token) throw new Error(USAGE);
      await new ShareApiService(http).download(token, { outPath });
      return;
    }

    default:
      throw new Error(USAGE);
  }
}

runClient(process.argv.slice(2)).catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : "Unknown error");
  process.exit(1);
});
