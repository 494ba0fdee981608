import { aggregateRate } from "./rate-aggregator";
import { Ad, TradeSide } from "../types/premiums/ads";

const ads = (side: TradeSide, prices: number[]): Ad[] =>
  prices.map((price) => ({ side, price }));

describe("aggregateRate", () => {
  it("averages the lowest SELL prices", () => {
    const rate = aggregateRate(ads("SELL", [20, 10, 40, 30, 50]), "SELL", 3);

    expect(rate).toEqual({ side: "SELL", value: 20, sampleSize: 3 });
  });

  it("averages the lowest BUY prices", () => {
    const rate = aggregateRate(ads("BUY", [20, 10, 40, 30, 50]), "BUY", 3);

    expect(rate).toEqual({ side: "BUY", value: 20, sampleSize: 3 });
  });

  it("ignores expensive outliers at the top of the BUY book", () => {
    const rate = aggregateRate(ads("BUY", [30, 18.6, 25, 18.5, 18.7]), "BUY", 2);

    expect(rate?.value).toBeCloseTo(18.55, 10);
    expect(rate?.sampleSize).toBe(2);
  });

  it("ignores ads of the other side", () => {
    const mixed = [...ads("SELL", [10, 12]), ...ads("BUY", [100, 200])];

    expect(aggregateRate(mixed, "SELL", 2)?.value).toBe(11);
    expect(aggregateRate(mixed, "SELL", 3)).toBeNull();
  });

  it("uses every ad when exactly k are available", () => {
    const rate = aggregateRate(ads("SELL", [18.9, 19, 19.1, 19.2, 19.3]), "SELL");

    expect(rate?.sampleSize).toBe(5);
    expect(rate?.value).toBeCloseTo(19.1, 10);
  });

  it("returns null for fewer than k ads or none at all", () => {
    expect(aggregateRate(ads("SELL", [1, 2, 3, 4]), "SELL")).toBeNull();
    expect(aggregateRate([], "BUY", 1)).toBeNull();
  });

  it("skips non-positive prices", () => {
    const rate = aggregateRate(ads("SELL", [0, -5, 7]), "SELL", 1);

    expect(rate).toEqual({ side: "SELL", value: 7, sampleSize: 1 });
  });

  it("does not reorder the input", () => {
    const input = ads("SELL", [3, 1, 2]);
    aggregateRate(input, "SELL", 2);

    expect(input.map((a) => a.price)).toEqual([3, 1, 2]);
  });

  it.each([0, -1, 2.5])("rejects minValidAds %p", (k) => {
    expect(() => aggregateRate(ads("SELL", [1]), "SELL", k)).toThrow(
      RangeError
    );
  });
});
