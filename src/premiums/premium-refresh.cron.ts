import { Inject, Injectable, Logger } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { QuoteOrchestrator } from "./quote-orchestrator.service";
import { PremiumSnapshotStore } from "./premium-snapshot.store";
import { PREMIUMS_CONFIG, SNAPSHOT_CONFIG } from "./premium-providers";
import { PremiumsConfig, SnapshotConfig } from "../config/configuration";
import { errorMessage } from "./providers/provider-errors";

/**
 * Refresh the cached snapshot of every default fiat once a minute.
 * Disabled unless SNAPSHOT_REFRESH_ENABLED=true.
 */
@Injectable()
export class PremiumRefreshCron {
  private readonly logger = new Logger(PremiumRefreshCron.name);

  constructor(
    private readonly orchestrator: QuoteOrchestrator,
    private readonly store: PremiumSnapshotStore,
    @Inject(PREMIUMS_CONFIG) private readonly premiumsConfig: PremiumsConfig,
    @Inject(SNAPSHOT_CONFIG) private readonly snapshotConfig: SnapshotConfig
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async refreshSnapshots(): Promise<void> {
    if (!this.snapshotConfig.refreshEnabled) return;

    try {
      const records = await this.orchestrator.collectMany(
        this.premiumsConfig.defaultFiats
      );

      const saved = await Promise.allSettled(
        records.map((record) => this.store.save(record))
      );
      const failures = saved.filter((s) => s.status === "rejected").length;

      if (failures > 0) {
        this.logger.warn(
          `Cached ${records.length - failures}/${records.length} premium snapshots`
        );
      } else {
        this.logger.log(`Cached ${records.length} premium snapshots`);
      }
    } catch (error) {
      this.logger.error(
        `Failed to refresh premium snapshots: ${errorMessage(error)}`
      );
    }
  }
}
