export type PremiumStatus = "ok" | "insufficient_data";

export type PremiumResult =
  | {
      status: "ok";
      sellPremium: number;
      buyPremium: number;
      buySellSpread: number;
    }
  | {
      status: "insufficient_data";
      sellPremium: null;
      buyPremium: null;
      buySellSpread: null;
    };

export type PremiumError = "insufficient_p2p_data" | "insufficient_fx_data";

/**
 * Output row for one (asset, fiat, reference fiat) triple. Field names are
 * the external wire format shared by the HTTP API, the CLI and the cache.
 */
export interface PremiumRecord {
  fiat: string;
  asset: string;
  ref_fiat: string;
  sell_rate: number | null;
  buy_rate: number | null;
  fx: { bid: number; ask: number } | null;
  stablecoin_sell_premium: number | null;
  stablecoin_buy_premium: number | null;
  stablecoin_buy_sell_spread: number | null;
  status: PremiumStatus;
  error: PremiumError | null;
}
