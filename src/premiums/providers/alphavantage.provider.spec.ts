import { Logger } from "@nestjs/common";
import axios from "axios";
import { AlphaVantageProvider } from "./alphavantage.provider";
import { axiosError, axiosResponse } from "../../testing/axios-response";

describe("AlphaVantageProvider", () => {
  beforeAll(() => Logger.overrideLogger(false));
  afterEach(() => jest.restoreAllMocks());

  it("reads bid, ask and the exchange rate", async () => {
    const get = jest.spyOn(axios, "get").mockResolvedValue(
      axiosResponse({
        "Realtime Currency Exchange Rate": {
          "1. From_Currency Code": "USD",
          "2. From_Currency Name": "United States Dollar",
          "3. To_Currency Code": "BRL",
          "4. To_Currency Name": "Brazilian Real",
          "5. Exchange Rate": "5.43210000",
          "6. Last Refreshed": "2026-01-05 12:00:01",
          "7. Time Zone": "UTC",
          "8. Bid Price": "5.43100000",
          "9. Ask Price": "5.43300000",
        },
      })
    );

    const provider = new AlphaVantageProvider({ apiKey: null, timeoutMs: 2000 });

    expect(await provider.fetchFx("BRL", "USD")).toEqual({
      bid: "5.43100000",
      ask: "5.43300000",
      mid: "5.43210000",
    });
    expect(get).toHaveBeenCalledWith("https://www.alphavantage.co/query", {
      params: {
        function: "CURRENCY_EXCHANGE_RATE",
        from_currency: "USD",
        to_currency: "BRL",
        apikey: "demo",
      },
      timeout: 2000,
    });
  });

  it("returns null for errors and rate-limit notes", async () => {
    jest
      .spyOn(axios, "get")
      .mockResolvedValueOnce(axiosResponse({ "Error Message": "Invalid API call." }))
      .mockResolvedValueOnce(axiosResponse({ Note: "5 calls per minute" }))
      .mockRejectedValueOnce(axiosError("ECONNABORTED"));

    const provider = new AlphaVantageProvider({
      apiKey: "test-secret",
      timeoutMs: 2000,
    });

    expect(await provider.fetchFx("BRL", "USD")).toBeNull();
    expect(await provider.fetchFx("BRL", "USD")).toBeNull();
    expect(await provider.fetchFx("BRL", "USD")).toBeNull();
  });
});
