import { Logger } from "@nestjs/common";
import axios from "axios";
import { BinanceP2PProvider } from "./binance-p2p.provider";
import { axiosError, axiosResponse } from "../../testing/axios-response";

const item = (price: string, extra: Record<string, unknown> = {}) => ({
  adv: {
    price,
    minSingleTransAmount: "100.00",
    maxSingleTransAmount: "5000.00",
    tradableQuantity: "250.5",
    tradeMethods: [{ identifier: "SPEI" }, { tradeMethodName: "Cash" }],
    ...extra,
  },
  advertiser: { nickName: "trader-1" },
});

describe("BinanceP2PProvider", () => {
  const provider = new BinanceP2PProvider({
    rows: 10,
    timeoutMs: 5000,
    maxRetries: 3,
    retrySleepMs: 0,
  });

  beforeAll(() => Logger.overrideLogger(false));
  afterEach(() => jest.restoreAllMocks());

  it("requests one side of the book and maps the ads", async () => {
    const post = jest.spyOn(axios, "post").mockResolvedValue(
      axiosResponse({
        code: "000000",
        data: [item("18.95"), { advertiser: { nickName: "no-adv" } }],
        success: true,
      })
    );

    const ads = await provider.fetchAds("MXN", "USDT", "SELL");

    expect(ads).toEqual([
      {
        side: "SELL",
        price: 18.95,
        minAmount: 100,
        maxAmount: 5000,
        availableQuantity: 250.5,
        paymentMethods: ["SPEI"],
        advertiser: "trader-1",
      },
    ]);
    expect(post).toHaveBeenCalledWith(
      "https://p2p.binance.com/bapi/c2c/v2/friendly/c2c/adv/search",
      {
        fiat: "MXN",
        page: 1,
        rows: 10,
        asset: "USDT",
        tradeType: "SELL",
        payTypes: [],
        countries: [],
      },
      expect.objectContaining({ timeout: 5000 })
    );
  });

  it("maps a missing price to NaN so the filter drops it", async () => {
    jest
      .spyOn(axios, "post")
      .mockResolvedValue(axiosResponse({ data: [item("")] }));

    const ads = await provider.fetchAds("MXN", "USDT", "BUY");

    expect(ads?.[0].price).toBeNaN();
  });

  it("skips null entries and reads numeric prices", async () => {
    const post = jest.spyOn(axios, "post").mockResolvedValue(
      axiosResponse({
        data: [null, { adv: { price: 18.9, tradeMethods: [null] } }],
      })
    );

    const ads = await provider.fetchAds("MXN", "USDT", "SELL");

    expect(post).toHaveBeenCalledTimes(1);
    expect(ads).toEqual([
      {
        side: "SELL",
        price: 18.9,
        minAmount: undefined,
        maxAmount: undefined,
        availableQuantity: undefined,
        paymentMethods: [],
        advertiser: undefined,
      },
    ]);
  });

  it("does not retry failures other than transport errors", async () => {
    const post = jest
      .spyOn(axios, "post")
      .mockRejectedValue(new TypeError("Cannot read properties of null"));

    expect(await provider.fetchAds("MXN", "USDT", "BUY")).toBeNull();
    expect(post).toHaveBeenCalledTimes(1);
  });

  it("treats a missing data list as an empty book", async () => {
    jest.spyOn(axios, "post").mockResolvedValue(axiosResponse({ data: null }));

    expect(await provider.fetchAds("MXN", "USDT", "BUY")).toEqual([]);
  });

  it("returns null for a malformed payload", async () => {
    jest
      .spyOn(axios, "post")
      .mockResolvedValue(axiosResponse({ data: { ads: [] } }));

    expect(await provider.fetchAds("MXN", "USDT", "BUY")).toBeNull();
  });

  it("retries failed requests", async () => {
    const post = jest
      .spyOn(axios, "post")
      .mockRejectedValueOnce(axiosError("ECONNABORTED"))
      .mockRejectedValueOnce(axiosError("ERR_BAD_RESPONSE", 502))
      .mockResolvedValue(axiosResponse({ data: [item("19.1")] }));

    const ads = await provider.fetchAds("MXN", "USDT", "BUY");

    expect(post).toHaveBeenCalledTimes(3);
    expect(ads?.map((ad) => ad.price)).toEqual([19.1]);
  });

  it("returns null once every attempt has failed", async () => {
    const warn = jest.spyOn(Logger.prototype, "warn");
    const post = jest
      .spyOn(axios, "post")
      .mockRejectedValue(axiosError("ETIMEDOUT"));

    expect(await provider.fetchAds("ARS", "USDT", "SELL")).toBeNull();
    expect(post).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenLastCalledWith(
      "Timeout fetching SELL ads for USDT/ARS from Binance P2P (attempt 3/3)"
    );
  });

  it("makes a single attempt when retries are disabled", async () => {
    const once = new BinanceP2PProvider({
      rows: 10,
      timeoutMs: 5000,
      maxRetries: 0,
      retrySleepMs: 0,
    });
    const post = jest
      .spyOn(axios, "post")
      .mockRejectedValue(new Error("socket hang up"));

    expect(await once.fetchAds("MXN", "USDT", "BUY")).toBeNull();
    expect(post).toHaveBeenCalledTimes(1);
  });
});
