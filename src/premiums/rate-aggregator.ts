import { Ad, AggregatedRate, TradeSide } from "../types/premiums/ads";

export const DEFAULT_MIN_VALID_ADS = 5;

// Cheapest first on both sides of the book.
const byPrice = (a: number, b: number) => a - b;

/**
 * Reduce same-side ads to one representative rate: the unweighted mean of
 * the `minValidAds` lowest prices.
 *
 * Returns null when fewer than `minValidAds` ads are usable; no partial
 * average is ever produced. Volume weighting is not applied.
 */
export function aggregateRate(
  ads: readonly Ad[],
  side: TradeSide,
  minValidAds: number = DEFAULT_MIN_VALID_ADS
): AggregatedRate | null {
  if (!Number.isInteger(minValidAds) || minValidAds < 1) {
    throw new RangeError(
      `minValidAds must be a positive integer; got ${minValidAds}`
    );
  }

  const prices = ads
    .filter(
      (ad) => ad.side === side && Number.isFinite(ad.price) && ad.price > 0
    )
    .map((ad) => ad.price);

  if (prices.length === 0 || prices.length < minValidAds) {
    return null;
  }

  const top = [...prices].sort(byPrice).slice(0, minValidAds);
  const value = top.reduce((sum, price) => sum + price, 0) / top.length;

  return { side, value, sampleSize: top.length };
}
