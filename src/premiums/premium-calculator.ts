import { PremiumResult } from "../types/premiums/premiums";

type RateInput = number | null | undefined;

export interface PremiumInputs {
  /** Price at which a user sells the stablecoin (receives fiat) */
  sellRate: RateInput;
  /** Price at which a user buys the stablecoin (pays fiat) */
  buyRate: RateInput;
  /** Reference bid, compared against the sell rate */
  fxBid: RateInput;
  /** Reference ask, compared against the buy rate */
  fxAsk: RateInput;
}

export interface PremiumOptions {
  /** Round the three metrics to this many decimals; full precision if omitted */
  decimals?: number | null;
}

/**
 * A zero, negative or non-finite rate reached the calculator. Upstream
 * components never emit such rates, so this signals a bug, not missing data.
 */
export class InvalidRateError extends Error {
  constructor(
    readonly field: string,
    readonly value: number
  ) {
    super(`${field} must be a positive finite number; got ${value}`);
    this.name = "InvalidRateError";
  }
}

function assertPositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidRateError(field, value);
  }
}

function roundTo(value: number, decimals: number | null | undefined): number {
  if (decimals === null || decimals === undefined) return value;
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 20) {
    throw new RangeError(`decimals must be an integer in [0, 20]; got ${decimals}`);
  }
  return Number(value.toFixed(decimals));
}

/**
 * Premium in percent of `observed` over `reference`. Positive when the local
 * market trades above the reference, negative at a discount.
 */
export function computePremium(observed: number, reference: number): number {
  assertPositive("observed", observed);
  assertPositive("reference", reference);
  return ((observed - reference) / reference) * 100;
}

/**
 * Relative buy/sell spread in percent, measured from the sell rate.
 */
export function computeSpread(buyRate: number, sellRate: number): number {
  assertPositive("buyRate", buyRate);
  assertPositive("sellRate", sellRate);
  return ((buyRate - sellRate) / sellRate) * 100;
}

export function insufficientData(): PremiumResult {
  return {
    status: "insufficient_data",
    sellPremium: null,
    buyPremium: null,
    buySellSpread: null,
  };
}

/**
 * Combine P2P rates with the FX reference. Any missing input yields
 * `insufficient_data` with all metrics null; present inputs must be positive.
 */
export function computePremiums(
  inputs: PremiumInputs,
  options: PremiumOptions = {}
): PremiumResult {
  const { sellRate, buyRate, fxBid, fxAsk } = inputs;

  if (
    sellRate === null ||
    sellRate === undefined ||
    buyRate === null ||
    buyRate === undefined ||
    fxBid === null ||
    fxBid === undefined ||
    fxAsk === null ||
    fxAsk === undefined
  ) {
    return insufficientData();
  }

  assertPositive("sellRate", sellRate);
  assertPositive("buyRate", buyRate);
  assertPositive("fxBid", fxBid);
  assertPositive("fxAsk", fxAsk);

  return {
    status: "ok",
    sellPremium: roundTo(computePremium(sellRate, fxBid), options.decimals),
    buyPremium: roundTo(computePremium(buyRate, fxAsk), options.decimals),
    buySellSpread: roundTo(computeSpread(buyRate, sellRate), options.decimals),
  };
}
