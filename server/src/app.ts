import express from "express";
import type { Express } from "express";
import cors from "cors";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { createShareController } from "./controllers/share.controller";
import type { AppConfig } from "./config";
import type { Services } from "./services";

export function createApp(
  config: Pick<
    AppConfig,
    "maxFileSize" | "apiKey" | "publicBaseUrl" | "title" | "subtitle"
  >,
  services: Services,
): Express {
  const app = express();
  const authMiddleware = createAuthMiddleware(config.apiKey);
  const shareController = createShareController({
    config,
    uploads: services.uploads,
    downloads: services.downloads,
    shares: services.shares,
    progress: services.progress,
  });

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Public routes
  app.get("/health", shareController.healthCheck);
  app.get("/auth/me", shareController.me);
  app.get("/api/config", shareController.getConfig);
  // HEAD must not reach the GET handler, which counts a download
  app.head("/share/:token", shareController.headShare);
  app.get("/share/:token", shareController.fetchShare);

  // Protected routes
  app.post("/api/upload", authMiddleware, shareController.createShare);
  app.get(
    "/api/upload-progress/:uploadId",
    authMiddleware,
    shareController.getUploadProgress,
  );
  app.get("/api/files", authMiddleware, shareController.listShares);
  app.delete("/api/files/:id", authMiddleware, shareController.deleteShare);

  return app;
}
