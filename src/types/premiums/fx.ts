/** Raw numeric field as providers return it: number, numeric string or nothing */
export type RawRate = number | string | null | undefined;

export interface FxQuoteResponse {
  bid?: RawRate;
  ask?: RawRate;
  mid?: RawRate;
}

export interface FxRate {
  bid: number;
  ask: number;
  mid: number;
  /** "mid" means bid and ask were both set to the provider's single rate */
  source: "two-sided" | "mid";
}
