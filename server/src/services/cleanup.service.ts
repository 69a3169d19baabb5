import cron, { type ScheduledTask } from "node-cron";
import logger from "../utils/logger";
import { errorCategory } from "../utils/errors";
import type { ShareRegistry } from "./registry.service";
import type { StorageService } from "./storage.service";
import type { ProgressStore } from "./progress.service";

export const DEFAULT_SWEEP_SCHEDULE = "0 * * * *";

/**
 * Reclaims shares that expired or were left exhausted. Enforcement of the
 * download cap stays with the download path; this only frees storage.
 */
export class CleanupService {
  private task: ScheduledTask | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private readonly registry: ShareRegistry,
    private readonly storage: StorageService,
    private readonly progress: ProgressStore | null = null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Returns the number of share records removed. */
  async sweep(now: Date = this.now()): Promise<number> {
    const removed = await this.registry.sweepExpiredOrExhausted(now);

    for (const record of removed) {
      const filePath = this.storage.sharePath(record.token, record.filename);
      try {
        const existed = await this.storage.remove(filePath);
        if (!existed) {
          logger.debug(`File of share ${record.id} was already gone`);
        }
      } catch (error) {
        logger.error(`Could not remove file of share ${record.id}`, {
          category: errorCategory(error),
        });
      }
    }

    const pruned = this.progress ? this.progress.prune() : 0;

    if (removed.length > 0 || pruned > 0) {
      logger.info("Cleanup sweep finished", {
        shares: removed.length,
        progressEntries: pruned,
      });
    }
    return removed.length;
  }

  start(schedule: string = DEFAULT_SWEEP_SCHEDULE): void {
    if (this.task) return;
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid sweep schedule: ${schedule}`);
    }

    this.task = cron.schedule(schedule, () => {
      void this.runScheduled();
    });
    logger.info(`Cleanup sweeper scheduled: ${schedule}`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  private async runScheduled(): Promise<void> {
    // Skip a tick rather than overlap with a sweep that is still running.
    if (this.running) return;
    this.running = this.sweep();
    try {
      await this.running;
    } catch (error) {
      logger.error("Scheduled cleanup sweep failed", {
        category: errorCategory(error),
      });
    } finally {
      this.running = null;
    }
  }
}
