import { FxProvider } from "../premium-providers";
import { ProvidersConfig } from "../../config/configuration";
import { AlphaVantageProvider } from "./alphavantage.provider";
import { AwesomeApiProvider } from "./awesomeapi.provider";
import { CoinApiProvider } from "./coinapi.provider";
import { XeProvider } from "./xe.provider";

export function createFxProvider(config: ProvidersConfig): FxProvider {
  const timeoutMs = config.http.timeoutMs;

  switch (config.fxProvider) {
    case "coinapi":
      return new CoinApiProvider({ ...config.coinApi, timeoutMs });
    case "alphavantage":
      return new AlphaVantageProvider({ ...config.alphaVantage, timeoutMs });
    case "awesomeapi":
      return new AwesomeApiProvider({ timeoutMs });
    case "xe":
      return new XeProvider({ ...config.xe, timeoutMs });
  }
}
