import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from "@nestjs/common";
import { SNAPSHOT_CONFIG } from "./premium-providers";
import { SnapshotConfig } from "../config/configuration";
import { RedisKey } from "../types/premiums/redis";
import { PremiumRecord } from "../types/premiums/premiums";

/**
 * The subset of the ioredis client the snapshot cache relies on.
 */
export interface SnapshotCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  disconnect(): void;
}

export const REDIS_CLIENT = "REDIS_CLIENT";

function isPremiumRecord(value: unknown): value is PremiumRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "fiat" in value &&
    typeof value.fiat === "string" &&
    "asset" in value &&
    typeof value.asset === "string" &&
    "ref_fiat" in value &&
    typeof value.ref_fiat === "string" &&
    "status" in value &&
    (value.status === "ok" || value.status === "insufficient_data")
  );
}

/**
 * Latest premium record per market, kept in Redis with a TTL. Only the most
 * recent value is stored.
 */
@Injectable()
export class PremiumSnapshotStore implements OnApplicationShutdown {
  private readonly logger = new Logger(PremiumSnapshotStore.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: SnapshotCacheClient,
    @Inject(SNAPSHOT_CONFIG) private readonly config: SnapshotConfig
  ) {}

  async save(record: PremiumRecord): Promise<void> {
    const key = RedisKey.latestPremium(
      record.asset,
      record.fiat,
      record.ref_fiat
    );
    await this.redis.set(key, JSON.stringify(record), "PX", this.config.ttlMs);
  }

  async get(
    asset: string,
    fiat: string,
    refFiat: string
  ): Promise<PremiumRecord | null> {
    const key = RedisKey.latestPremium(asset, fiat, refFiat);
    const raw = await this.redis.get(key);
    if (!raw) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Discarding unparsable snapshot at ${key}`);
      return null;
    }

    if (!isPremiumRecord(parsed)) {
      this.logger.warn(`Discarding malformed snapshot at ${key}`);
      return null;
    }
    return parsed;
  }

  onApplicationShutdown(): void {
    this.redis.disconnect();
  }
}
