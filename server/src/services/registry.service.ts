import sqlite3 from "sqlite3";
import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { ShareError } from "../utils/errors";
import { generateToken } from "../utils/token";
import type {
  CreateShareInput,
  DownloadOutcome,
  ShareRecord,
} from "../models/share.model";

export interface ShareRow {
  id: number;
  filename: string;
  token: string;
  size: number;
  expires_at: number;
  max_downloads: number | null;
  download_count: number;
  created_at: number;
}

const MAX_CREATE_ATTEMPTS = 5;

const EXHAUSTED_OR_EXPIRED = `
  expires_at <= ? OR (max_downloads IS NOT NULL AND download_count >= max_downloads)
`;

function toRecord(row: ShareRow): ShareRecord {
  return {
    id: row.id,
    filename: row.filename,
    token: row.token,
    size: row.size,
    expiresAt: new Date(row.expires_at),
    maxDownloads: row.max_downloads,
    downloadCount: row.download_count,
    createdAt: new Date(row.created_at),
  };
}

function isTokenCollision(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "SQLITE_CONSTRAINT" &&
    error.message.includes("shares.token")
  );
}

/**
 * Persisted share metadata. The registry owns its connection and runs every
 * operation through a single queue, so a transaction never interleaves with
 * statements issued by another caller.
 */
export class ShareRegistry {
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly db: sqlite3.Database,
    private readonly nextToken: () => string,
  ) {}

  static async open(
    dbPath: string,
    nextToken: () => string = generateToken,
  ): Promise<ShareRegistry> {
    if (dbPath !== ":memory:") {
      await fs.promises.mkdir(path.dirname(dbPath), { recursive: true });
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, (err) => {
        if (err) reject(err);
        else resolve(handle);
      });
    });

    const registry = new ShareRegistry(db, nextToken);
    await registry.init();
    logger.info(`Connected to database at ${dbPath}`);
    return registry;
  }

  private async init(): Promise<void> {
    await this.execSql(`
      CREATE TABLE IF NOT EXISTS shares (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        filename TEXT NOT NULL,
        token TEXT NOT NULL UNIQUE,
        size INTEGER NOT NULL DEFAULT 0,
        expires_at INTEGER NOT NULL,
        max_downloads INTEGER CHECK (max_downloads IS NULL OR max_downloads > 0),
        download_count INTEGER NOT NULL DEFAULT 0 CHECK (download_count >= 0),
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_shares_expires_at ON shares(expires_at);
      CREATE TABLE IF NOT EXISTS exhausted_tokens (
        token TEXT PRIMARY KEY,
        expires_at INTEGER NOT NULL
      );
    `);
  }

  async create(input: CreateShareInput, now: Date): Promise<ShareRecord> {
    for (let attempt = 1; attempt <= MAX_CREATE_ATTEMPTS; attempt++) {
      const token = this.nextToken();
      try {
        return await this.transaction(async () => {
          const { lastID } = await this.runSql(
            `INSERT INTO shares (
              filename, token, size, expires_at, max_downloads, created_at
            ) VALUES (?, ?, ?, ?, ?, ?)`,
            [
              input.filename,
              token,
              input.size,
              now.getTime() + input.ttlMs,
              input.maxDownloads,
              now.getTime(),
            ],
          );
          const row = await this.getRow<ShareRow>(
            "SELECT * FROM shares WHERE id = ?",
            [lastID],
          );
          if (!row) {
            throw new ShareError("internal", "Inserted share not readable");
          }
          return toRecord(row);
        });
      } catch (error) {
        if (!isTokenCollision(error)) throw error;
        logger.warn(`Token collision on attempt ${attempt}, retrying`);
      }
    }

    throw new ShareError(
      "internal",
      `Could not allocate a unique token after ${MAX_CREATE_ATTEMPTS} attempts`,
    );
  }

  async get(token: string): Promise<ShareRecord | null> {
    const row = await this.serialized(() =>
      this.getRow<ShareRow>("SELECT * FROM shares WHERE token = ?", [token]),
    );
    return row ? toRecord(row) : null;
  }

  /**
   * True when the token belonged to a share deleted on its last allowed
   * download and the share's scheduled expiry has not passed yet.
   */
  async wasExhausted(token: string, now: Date): Promise<boolean> {
    return this.serialized(() => this.isExhaustedToken(token, now));
  }

  async getById(id: number): Promise<ShareRecord | null> {
    const row = await this.serialized(() =>
      this.getRow<ShareRow>("SELECT * FROM shares WHERE id = ?", [id]),
    );
    return row ? toRecord(row) : null;
  }

  async listActive(now: Date): Promise<ShareRecord[]> {
    const rows = await this.serialized(() =>
      this.allRows<ShareRow>(
        "SELECT * FROM shares WHERE expires_at > ? ORDER BY created_at DESC, id DESC",
        [now.getTime()],
      ),
    );
    return rows.map(toRecord);
  }

  /**
   * Counts one download. The increment is conditional on the share still
   * being live, and a share that reaches its cap is deleted before the
   * transaction commits, so no concurrent caller can observe it as active.
   */
  async incrementAndMaybeDelete(
    token: string,
    now: Date,
  ): Promise<DownloadOutcome> {
    return this.transaction(async (): Promise<DownloadOutcome> => {
      const current = await this.getRow<ShareRow>(
        "SELECT * FROM shares WHERE token = ?",
        [token],
      );
      if (!current) {
        return (await this.isExhaustedToken(token, now))
          ? { status: "limit_reached", record: null }
          : { status: "not_found" };
      }

      if (now.getTime() >= current.expires_at) {
        return { status: "expired", record: toRecord(current) };
      }

      const { changes } = await this.runSql(
        `UPDATE shares SET download_count = download_count + 1
         WHERE id = ? AND (max_downloads IS NULL OR download_count < max_downloads)`,
        [current.id],
      );
      if (changes !== 1) {
        return { status: "limit_reached", record: toRecord(current) };
      }

      const updated = await this.getRow<ShareRow>(
        "SELECT * FROM shares WHERE id = ?",
        [current.id],
      );
      if (!updated) {
        throw new ShareError("internal", "Share vanished inside transaction");
      }

      if (
        updated.max_downloads !== null &&
        updated.download_count >= updated.max_downloads
      ) {
        await this.runSql("DELETE FROM shares WHERE id = ?", [updated.id]);
        await this.runSql(
          "INSERT OR REPLACE INTO exhausted_tokens (token, expires_at) VALUES (?, ?)",
          [updated.token, updated.expires_at],
        );
        return { status: "last_download", record: toRecord(updated) };
      }

      return { status: "continuing", record: toRecord(updated) };
    });
  }

  async deleteById(id: number): Promise<ShareRecord | null> {
    return this.transaction(async () => {
      const row = await this.getRow<ShareRow>(
        "SELECT * FROM shares WHERE id = ?",
        [id],
      );
      if (!row) return null;
      await this.runSql("DELETE FROM shares WHERE id = ?", [id]);
      return toRecord(row);
    });
  }

  /** Removes expired or exhausted records and returns them for file cleanup. */
  async sweepExpiredOrExhausted(now: Date): Promise<ShareRecord[]> {
    return this.transaction(async () => {
      const rows = await this.allRows<ShareRow>(
        `SELECT * FROM shares WHERE ${EXHAUSTED_OR_EXPIRED}`,
        [now.getTime()],
      );
      if (rows.length > 0) {
        await this.runSql(`DELETE FROM shares WHERE ${EXHAUSTED_OR_EXPIRED}`, [
          now.getTime(),
        ]);
      }
      await this.runSql("DELETE FROM exhausted_tokens WHERE expires_at <= ?", [
        now.getTime(),
      ]);
      return rows.map(toRecord);
    });
  }

  async close(): Promise<void> {
    await this.serialized(
      () =>
        new Promise<void>((resolve, reject) => {
          this.db.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        }),
    );
  }

  private async isExhaustedToken(token: string, now: Date): Promise<boolean> {
    const row = await this.getRow<{ expires_at: number }>(
      "SELECT expires_at FROM exhausted_tokens WHERE token = ?",
      [token],
    );
    return row !== undefined && row.expires_at > now.getTime();
  }

  private serialized<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private transaction<T>(work: () => Promise<T>): Promise<T> {
    return this.serialized(async () => {
      await this.execSql("BEGIN IMMEDIATE");
      try {
        const value = await work();
        await this.execSql("COMMIT");
        return value;
      } catch (error) {
        await this.execSql("ROLLBACK");
        throw error;
      }
    });
  }

  private execSql(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private runSql(
    sql: string,
    params: unknown[],
  ): Promise<{ lastID: number; changes: number }> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) reject(err);
        else resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  private getRow<T>(sql: string, params: unknown[]): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private allRows<T>(sql: string, params: unknown[]): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(err);
        else resolve(rows || []);
      });
    });
  }
}
