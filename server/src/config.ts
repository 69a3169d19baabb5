import Joi from "joi";
import { DEFAULT_SWEEP_SCHEDULE } from "./services/cleanup.service";

export interface AppConfig {
  port: number;
  dbPath: string;
  uploadDir: string;
  maxFileSize: number;
  apiKey: string | null;
  sweepSchedule: string;
  progressRetentionMs: number;
  publicBaseUrl: string | null;
  title: string;
  subtitle: string;
}

interface RawEnv {
  SERVER_PORT: number;
  DB_PATH: string;
  UPLOAD_DIR: string;
  MAX_FILE_SIZE: number;
  SERVER_API_KEY?: string;
  SWEEP_SCHEDULE: string;
  PROGRESS_RETENTION_SEC: number;
  PUBLIC_BASE_URL?: string;
  APP_TITLE: string;
  APP_SUBTITLE: string;
}

const envSchema = Joi.object<RawEnv>({
  SERVER_PORT: Joi.number().port().default(8000),
  DB_PATH: Joi.string().default("data/shares.db"),
  UPLOAD_DIR: Joi.string().default("uploads"),
  MAX_FILE_SIZE: Joi.number()
    .integer()
    .positive()
    .default(100 * 1024 * 1024),
  SERVER_API_KEY: Joi.string().empty("").optional(),
  SWEEP_SCHEDULE: Joi.string().default(DEFAULT_SWEEP_SCHEDULE),
  PROGRESS_RETENTION_SEC: Joi.number().integer().positive().default(300),
  PUBLIC_BASE_URL: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .empty("")
    .optional(),
  APP_TITLE: Joi.string().default("File Share"),
  APP_SUBTITLE: Joi.string().default("Simple, secure file sharing"),
}).unknown(true);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.validate(env, { abortEarly: false });
  const value = result.value;
  if (result.error || !value) {
    throw new Error(
      `Invalid configuration: ${result.error ? result.error.message : "empty"}`,
    );
  }

  return {
    port: value.SERVER_PORT,
    dbPath: value.DB_PATH,
    uploadDir: value.UPLOAD_DIR,
    maxFileSize: value.MAX_FILE_SIZE,
    apiKey: value.SERVER_API_KEY ?? null,
    sweepSchedule: value.SWEEP_SCHEDULE,
    progressRetentionMs: value.PROGRESS_RETENTION_SEC * 1000,
    publicBaseUrl: value.PUBLIC_BASE_URL
      ? value.PUBLIC_BASE_URL.replace(/\/+$/, "")
      : null,
    title: value.APP_TITLE,
    subtitle: value.APP_SUBTITLE,
  };
}
