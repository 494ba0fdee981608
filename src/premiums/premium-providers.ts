import { Ad, TradeSide } from "../types/premiums/ads";
import { FxQuoteResponse } from "../types/premiums/fx";

/**
 * Source of raw P2P order-book ads. Returns null when the fetch failed after
 * the provider's own retries; an empty list means the book was empty.
 */
export interface AdsProvider {
  venueId: string;
  fetchAds(fiat: string, asset: string, side: TradeSide): Promise<Ad[] | null>;
}

/**
 * Source of the reference rate, quoted as fiat units per one `refFiat`.
 */
export interface FxProvider {
  venueId: string;
  fetchFx(fiat: string, refFiat: string): Promise<FxQuoteResponse | null>;
}

export const ADS_PROVIDER = "ADS_PROVIDER";
export const FX_PROVIDER = "FX_PROVIDER";
export const PREMIUMS_CONFIG = "PREMIUMS_CONFIG";
export const PROVIDERS_CONFIG = "PROVIDERS_CONFIG";
export const SNAPSHOT_CONFIG = "SNAPSHOT_CONFIG";
