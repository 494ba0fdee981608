import { Ad, AdFilterOptions } from "../types/premiums/ads";

/**
 * Basic validity of a single ad: positive finite price and sane trade limits.
 */
export function isValidAd(ad: Ad): boolean {
  if (!Number.isFinite(ad.price) || ad.price <= 0) return false;

  const { minAmount, maxAmount } = ad;
  if (minAmount !== undefined && (Number.isNaN(minAmount) || minAmount < 0)) {
    return false;
  }
  if (maxAmount !== undefined && (Number.isNaN(maxAmount) || maxAmount <= 0)) {
    return false;
  }
  if (minAmount !== undefined && maxAmount !== undefined) {
    return minAmount <= maxAmount;
  }
  return true;
}

function intersectsTarget(
  ad: Ad,
  targetMin: number,
  targetMax: number
): boolean {
  const adMin = ad.minAmount ?? 0;
  const adMax = ad.maxAmount ?? Number.POSITIVE_INFINITY;
  return adMin <= targetMax && adMax >= targetMin;
}

/**
 * Keep the ads that are valid, whose trade-amount range overlaps the target
 * range, and that pass the optional predicate. Input order is preserved.
 */
export function filterAds(
  ads: readonly Ad[],
  options: AdFilterOptions = {}
): Ad[] {
  const targetMin = options.minAmount ?? 0;
  const targetMax = options.maxAmount ?? Number.POSITIVE_INFINITY;

  return ads.filter(
    (ad) =>
      isValidAd(ad) &&
      intersectsTarget(ad, targetMin, targetMax) &&
      (options.accept ? options.accept(ad) : true)
  );
}

/**
 * Accept ads offering at least one of the given payment methods
 * (case-insensitive). An empty list accepts every ad.
 */
export function paymentMethodPredicate(
  methods: readonly string[]
): (ad: Ad) => boolean {
  const wanted = new Set(methods.map((m) => m.trim().toUpperCase()));
  if (wanted.size === 0) return () => true;

  return (ad) =>
    (ad.paymentMethods ?? []).some((m) => wanted.has(m.toUpperCase()));
}
