import { FxQuoteResponse, FxRate, RawRate } from "../types/premiums/fx";

/**
 * Parse a provider rate field. Anything that is not a positive finite
 * number yields null.
 */
export function parseRate(value: RawRate): number | null {
  if (value === null || value === undefined) return null;

  const parsed =
    typeof value === "number"
      ? value
      : value.trim() === ""
        ? Number.NaN
        : Number(value);

  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Turn a provider response into a bid/ask pair.
 *
 * A usable two-sided quote (bid <= ask) is kept as is. Otherwise a mid rate
 * is used for both sides, which approximates rather than measures the
 * spread. Null when no usable rate is present.
 */
export function normalizeFx(
  response: FxQuoteResponse | null | undefined
): FxRate | null {
  if (!response) return null;

  const bid = parseRate(response.bid);
  const ask = parseRate(response.ask);
  const mid = parseRate(response.mid);

  if (bid !== null && ask !== null && bid <= ask) {
    return { bid, ask, mid: mid ?? (bid + ask) / 2, source: "two-sided" };
  }

  if (mid !== null) {
    return { bid: mid, ask: mid, mid, source: "mid" };
  }

  return null;
}
