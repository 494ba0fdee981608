import { Logger } from "@nestjs/common";
import { createFxProvider } from "./fx-provider.factory";
import { ProvidersConfig } from "../../config/configuration";
import { AlphaVantageProvider } from "./alphavantage.provider";
import { AwesomeApiProvider } from "./awesomeapi.provider";
import { CoinApiProvider } from "./coinapi.provider";
import { XeProvider } from "./xe.provider";

const config = (fxProvider: ProvidersConfig["fxProvider"]): ProvidersConfig => ({
  fxProvider,
  p2pRows: 20,
  http: { timeoutMs: 1000, maxRetries: 1, retrySleepMs: 0 },
  xe: { accountId: null, apiKey: null, baseUrl: "https://xe.example.test" },
  coinApi: { apiKey: null, baseUrl: "https://coinapi.example.test" },
  alphaVantage: { apiKey: null },
});

describe("createFxProvider", () => {
  beforeAll(() => Logger.overrideLogger(false));

  it.each([
    ["xe", XeProvider, "fx:xe"],
    ["coinapi", CoinApiProvider, "fx:coinapi"],
    ["alphavantage", AlphaVantageProvider, "fx:alphavantage"],
    ["awesomeapi", AwesomeApiProvider, "fx:awesomeapi"],
  ] as const)("builds the %s provider", (name, type, venueId) => {
    const provider = createFxProvider(config(name));

    expect(provider).toBeInstanceOf(type);
    expect(provider.venueId).toBe(venueId);
  });
});
