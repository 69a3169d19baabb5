import type { AppConfig } from "../config";
import { ShareRegistry } from "./registry.service";
import { StorageService } from "./storage.service";
import { ProgressStore } from "./progress.service";
import { UploadService } from "./upload.service";
import { DownloadService } from "./download.service";
import { ShareService } from "./share.service";
import { CleanupService } from "./cleanup.service";
import { generateToken } from "../utils/token";

export interface Services {
  registry: ShareRegistry;
  storage: StorageService;
  progress: ProgressStore;
  uploads: UploadService;
  downloads: DownloadService;
  shares: ShareService;
  cleanup: CleanupService;
}

export interface ServiceOverrides {
  now?: () => Date;
  nextToken?: () => string;
}

export async function createServices(
  config: Pick<
    AppConfig,
    "dbPath" | "uploadDir" | "maxFileSize" | "progressRetentionMs"
  >,
  overrides: ServiceOverrides = {},
): Promise<Services> {
  const now = overrides.now ?? (() => new Date());

  const registry = await ShareRegistry.open(
    config.dbPath,
    overrides.nextToken ?? generateToken,
  );
  const storage = new StorageService(config.uploadDir);
  await storage.ensureDirectory();

  const progress = new ProgressStore(config.progressRetentionMs, () =>
    now().getTime(),
  );

  return {
    registry,
    storage,
    progress,
    uploads: new UploadService(registry, storage, progress, {
      maxFileSize: config.maxFileSize,
      now,
    }),
    downloads: new DownloadService(registry, storage, now),
    shares: new ShareService(registry, storage, now),
    cleanup: new CleanupService(registry, storage, progress, now),
  };
}
