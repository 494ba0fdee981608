import { registerAs } from "@nestjs/config";

export const FX_PROVIDER_NAMES = [
  "xe",
  "coinapi",
  "alphavantage",
  "awesomeapi",
] as const;

export type FxProviderName = (typeof FX_PROVIDER_NAMES)[number];

export interface AppConfig {
  port: number;
  logLevel: string;
}

export interface PremiumsConfig {
  defaultAsset: string;
  refFiat: string;
  /** Fiats used when a request names none */
  defaultFiats: string[];
  /** Minimum usable ads per side, and the number of ads averaged */
  minValidAds: number;
  minTradeAmount?: number;
  maxTradeAmount?: number;
  /** Ads must offer one of these payment methods; empty accepts all */
  paymentMethods: string[];
  decimals: number | null;
}

export interface HttpConfig {
  timeoutMs: number;
  maxRetries: number;
  retrySleepMs: number;
}

export interface ProvidersConfig {
  fxProvider: FxProviderName;
  p2pRows: number;
  http: HttpConfig;
  xe: { accountId: string | null; apiKey: string | null; baseUrl: string };
  coinApi: { apiKey: string | null; baseUrl: string };
  alphaVantage: { apiKey: string | null };
}

export interface SnapshotConfig {
  redisUrl: string;
  ttlMs: number;
  refreshEnabled: boolean;
}

export function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function optionalNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function numberOr(raw: string | undefined, fallback: number): number {
  return optionalNumber(raw) ?? fallback;
}

function stringOrNull(raw: string | undefined): string | null {
  return raw && raw.trim() !== "" ? raw : null;
}

function isFxProviderName(value: string): value is FxProviderName {
  return FX_PROVIDER_NAMES.some((name) => name === value);
}

export const appConfig = registerAs(
  "app",
  (): AppConfig => ({
    port: numberOr(process.env.PORT, 8080),
    logLevel: process.env.LOG_LEVEL || "log",
  })
);

export const premiumsConfig = registerAs(
  "premiums",
  (): PremiumsConfig => ({
    defaultAsset: (process.env.DEFAULT_ASSET || "USDT").toUpperCase(),
    refFiat: (process.env.REF_FIAT || "USD").toUpperCase(),
    defaultFiats: parseList(process.env.DEFAULT_FIATS).map((f) =>
      f.toUpperCase()
    ),
    minValidAds: numberOr(process.env.MIN_VALID_ADS, 5),
    minTradeAmount: optionalNumber(process.env.MIN_TRADE_AMOUNT),
    maxTradeAmount: optionalNumber(process.env.MAX_TRADE_AMOUNT),
    paymentMethods: parseList(process.env.PAYMENT_METHODS),
    decimals: optionalNumber(process.env.DECIMALS) ?? null,
  })
);

export const providersConfig = registerAs("providers", (): ProvidersConfig => {
  const fxProvider = (process.env.FX_PROVIDER || "xe").toLowerCase();

  return {
    fxProvider: isFxProviderName(fxProvider) ? fxProvider : "xe",
    p2pRows: numberOr(process.env.P2P_ROWS, 20),
    http: {
      timeoutMs: numberOr(process.env.REQUEST_TIMEOUT_MS, 15000),
      maxRetries: numberOr(process.env.MAX_RETRIES, 3),
      retrySleepMs: numberOr(process.env.RETRY_SLEEP_MS, 5000),
    },
    xe: {
      accountId: stringOrNull(process.env.XE_API_ACCOUNT_ID),
      apiKey: stringOrNull(process.env.XE_API_KEY),
      baseUrl: process.env.XE_API_BASE_URL || "https://xecdapi.xe.com",
    },
    coinApi: {
      apiKey: stringOrNull(process.env.COINAPI_KEY),
      baseUrl: process.env.COINAPI_BASE_URL || "https://rest.coinapi.io",
    },
    alphaVantage: {
      apiKey: stringOrNull(process.env.ALPHA_VANTAGE_API_KEY),
    },
  };
});

export const snapshotConfig = registerAs(
  "snapshot",
  (): SnapshotConfig => ({
    redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
    ttlMs: numberOr(process.env.SNAPSHOT_TTL_MS, 120000),
    refreshEnabled: process.env.SNAPSHOT_REFRESH_ENABLED === "true",
  })
);
