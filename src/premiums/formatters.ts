import { stringify } from "csv-stringify/sync";
import { PremiumRecord } from "../types/premiums/premiums";

export const CSV_COLUMNS = [
  "fiat",
  "asset",
  "ref_fiat",
  "sell_rate",
  "buy_rate",
  "fx.bid",
  "fx.ask",
  "stablecoin_sell_premium",
  "stablecoin_buy_premium",
  "stablecoin_buy_sell_spread",
  "status",
  "error",
] as const;

export type OutputFormat = "json" | "csv";

export function toJson(records: readonly PremiumRecord[], pretty = false): string {
  return `${JSON.stringify(records, null, pretty ? 2 : undefined)}\n`;
}

/**
 * CSV with a fixed header; missing values are left blank.
 */
export function toCsv(records: readonly PremiumRecord[]): string {
  const rows = records.map((r) => [
    r.fiat,
    r.asset,
    r.ref_fiat,
    r.sell_rate,
    r.buy_rate,
    r.fx?.bid ?? null,
    r.fx?.ask ?? null,
    r.stablecoin_sell_premium,
    r.stablecoin_buy_premium,
    r.stablecoin_buy_sell_spread,
    r.status,
    r.error,
  ]);

  return stringify([[...CSV_COLUMNS], ...rows]);
}

export function formatRecords(
  records: readonly PremiumRecord[],
  format: OutputFormat,
  pretty = false
): string {
  return format === "csv" ? toCsv(records) : toJson(records, pretty);
}
