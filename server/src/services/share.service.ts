import logger from "../utils/logger";
import { ShareError } from "../utils/errors";
import type { ShareRegistry } from "./registry.service";
import type { StorageService } from "./storage.service";
import type { ShareRecord } from "../models/share.model";

export class ShareService {
  constructor(
    private readonly registry: ShareRegistry,
    private readonly storage: StorageService,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listActive(): Promise<ShareRecord[]> {
    return this.registry.listActive(this.now());
  }

  async deleteShare(id: number): Promise<void> {
    const record = await this.registry.deleteById(id);
    if (!record) {
      throw new ShareError("not_found", "Not found");
    }

    await this.storage.remove(
      this.storage.sharePath(record.token, record.filename),
    );
    logger.info(`Share ${id} deleted`);
  }
}
