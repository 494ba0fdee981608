import { DynamicModule, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  ADS_PROVIDER,
  FX_PROVIDER,
  PREMIUMS_CONFIG,
  PROVIDERS_CONFIG,
  SNAPSHOT_CONFIG,
} from "./premium-providers";
import { QuoteOrchestrator } from "./quote-orchestrator.service";
import { PremiumSnapshotStore, REDIS_CLIENT } from "./premium-snapshot.store";
import { PremiumRefreshCron } from "./premium-refresh.cron";
import { PremiumsController } from "./premiums.controller";
import { BinanceP2PProvider } from "./providers/binance-p2p.provider";
import { createFxProvider } from "./providers/fx-provider.factory";
import {
  PremiumsConfig,
  ProvidersConfig,
  SnapshotConfig,
} from "../config/configuration";
import { createRedisClient } from "../config/redis";

@Module({})
export class PremiumsModule {
  /**
   * Wire the engine to the providers and cache named by configuration.
   * Expects a global ConfigModule loading the premiums, providers and
   * snapshot namespaces.
   */
  static register(): DynamicModule {
    return {
      module: PremiumsModule,
      providers: [
        {
          provide: PREMIUMS_CONFIG,
          useFactory: (config: ConfigService) =>
            config.getOrThrow<PremiumsConfig>("premiums"),
          inject: [ConfigService],
        },
        {
          provide: PROVIDERS_CONFIG,
          useFactory: (config: ConfigService) =>
            config.getOrThrow<ProvidersConfig>("providers"),
          inject: [ConfigService],
        },
        {
          provide: SNAPSHOT_CONFIG,
          useFactory: (config: ConfigService) =>
            config.getOrThrow<SnapshotConfig>("snapshot"),
          inject: [ConfigService],
        },
        {
          provide: ADS_PROVIDER,
          useFactory: (providers: ProvidersConfig) =>
            new BinanceP2PProvider({ ...providers.http, rows: providers.p2pRows }),
          inject: [PROVIDERS_CONFIG],
        },
        {
          provide: FX_PROVIDER,
          useFactory: (providers: ProvidersConfig) => createFxProvider(providers),
          inject: [PROVIDERS_CONFIG],
        },
        {
          provide: REDIS_CLIENT,
          useFactory: (snapshot: SnapshotConfig) =>
            createRedisClient(snapshot.redisUrl),
          inject: [SNAPSHOT_CONFIG],
        },
        QuoteOrchestrator,
        PremiumSnapshotStore,
        PremiumRefreshCron,
      ],
      controllers: [PremiumsController],
      exports: [QuoteOrchestrator, PremiumSnapshotStore, PREMIUMS_CONFIG],
    };
  }
}
