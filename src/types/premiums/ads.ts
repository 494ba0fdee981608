export type TradeSide = "BUY" | "SELL";

export interface Ad {
  side: TradeSide;
  /** Fiat units per unit of asset */
  price: number;
  /** Smallest fiat amount the advertiser accepts per trade */
  minAmount?: number;
  /** Largest fiat amount the advertiser accepts per trade */
  maxAmount?: number;
  /** Asset quantity still available on the ad */
  availableQuantity?: number;
  /** Payment method identifiers (SPEI, PIX, BANK, etc.) */
  paymentMethods?: string[];
  advertiser?: string;
}

export interface AdFilterOptions {
  /** Lower bound of the caller's target trade amount */
  minAmount?: number;
  /** Upper bound of the caller's target trade amount */
  maxAmount?: number;
  /** Extra acceptance rule, e.g. payment method or country */
  accept?: (ad: Ad) => boolean;
}

export interface AggregatedRate {
  side: TradeSide;
  value: number;
  /** Number of ads the mean was taken over */
  sampleSize: number;
}
