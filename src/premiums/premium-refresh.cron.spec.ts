import { Logger } from "@nestjs/common";
import { PremiumRefreshCron } from "./premium-refresh.cron";
import { PremiumSnapshotStore } from "./premium-snapshot.store";
import { QuoteOrchestrator } from "./quote-orchestrator.service";
import { PremiumsConfig, SnapshotConfig } from "../config/configuration";
import { FakeRedis } from "../testing/fake-redis";

const premiumsConfig: PremiumsConfig = {
  defaultAsset: "USDT",
  refFiat: "USD",
  defaultFiats: ["MXN", "ARS"],
  minValidAds: 1,
  paymentMethods: [],
  decimals: 2,
};

describe("PremiumRefreshCron", () => {
  let redis: FakeRedis;
  let orchestrator: QuoteOrchestrator;

  const cron = (refreshEnabled: boolean) => {
    const snapshotConfig: SnapshotConfig = {
      redisUrl: "redis://localhost:6379",
      ttlMs: 60000,
      refreshEnabled,
    };
    return new PremiumRefreshCron(
      orchestrator,
      new PremiumSnapshotStore(redis, snapshotConfig),
      premiumsConfig,
      snapshotConfig
    );
  };

  beforeAll(() => Logger.overrideLogger(false));

  beforeEach(() => {
    redis = new FakeRedis();
    orchestrator = new QuoteOrchestrator(
      {
        venueId: "p2p:fake",
        fetchAds: async (_fiat, _asset, side) => [
          { side, price: side === "SELL" ? 20 : 19 },
        ],
      },
      { venueId: "fx:fake", fetchFx: async () => ({ mid: 18 }) },
      premiumsConfig
    );
  });

  afterEach(() => jest.restoreAllMocks());

  it("caches a snapshot for every default fiat", async () => {
    await cron(true).refreshSnapshots();

    expect([...redis.values.keys()]).toEqual([
      "premiums:latest:USDT:MXN:USD",
      "premiums:latest:USDT:ARS:USD",
    ]);
    expect(
      JSON.parse(redis.values.get("premiums:latest:USDT:ARS:USD") ?? "null")
    ).toMatchObject({ fiat: "ARS", sell_rate: 20, status: "ok" });
  });

  it("does nothing when disabled", async () => {
    const collect = jest.spyOn(orchestrator, "collectMany");

    await cron(false).refreshSnapshots();

    expect(collect).not.toHaveBeenCalled();
    expect(redis.values.size).toBe(0);
  });

  it("logs and survives failures", async () => {
    const error = jest.spyOn(Logger.prototype, "error");
    const warn = jest.spyOn(Logger.prototype, "warn");

    redis.failWrites = true;
    await cron(true).refreshSnapshots();
    expect(warn).toHaveBeenCalledWith("Cached 0/2 premium snapshots");

    jest
      .spyOn(orchestrator, "collectMany")
      .mockRejectedValue(new Error("boom"));
    await expect(cron(true).refreshSnapshots()).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith(
      "Failed to refresh premium snapshots: boom"
    );
  });
});
