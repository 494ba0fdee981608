import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { FxProvider } from "../premium-providers";
import { FxQuoteResponse } from "../../types/premiums/fx";
import { logProviderError } from "./provider-errors";

interface AlphaVantageResponse {
  "Realtime Currency Exchange Rate"?: {
    "1. From_Currency Code": string;
    "2. From_Currency Name": string;
    "3. To_Currency Code": string;
    "4. To_Currency Name": string;
    "5. Exchange Rate": string;
    "6. Last Refreshed": string;
    "7. Time Zone": string;
    "8. Bid Price": string;
    "9. Ask Price": string;
  };
  "Error Message"?: string;
  Note?: string;
  Information?: string;
}

export interface AlphaVantageProviderOptions {
  apiKey: string | null;
  timeoutMs: number;
}

@Injectable()
export class AlphaVantageProvider implements FxProvider {
  private readonly logger = new Logger(AlphaVantageProvider.name);
  readonly venueId = "fx:alphavantage";

  private readonly apiKey: string;
  private readonly baseUrl = "https://www.alphavantage.co/query";

  constructor(private readonly options: AlphaVantageProviderOptions) {
    this.apiKey = options.apiKey ?? "demo";
    if (this.apiKey === "demo") {
      this.logger.warn(
        "Alpha Vantage API key not configured. Using demo key (limited requests)."
      );
    }
  }

  async fetchFx(
    fiat: string,
    refFiat: string
  ): Promise<FxQuoteResponse | null> {
    try {
      const response = await axios.get<AlphaVantageResponse>(this.baseUrl, {
        params: {
          function: "CURRENCY_EXCHANGE_RATE",
          from_currency: refFiat,
          to_currency: fiat,
          apikey: this.apiKey,
        },
        timeout: this.options.timeoutMs,
      });

      const data = response.data;

      if (data["Error Message"]) {
        this.logger.error(
          `Alpha Vantage error for ${refFiat} → ${fiat}: ${data["Error Message"]}`
        );
        return null;
      }

      if (data["Note"] || data["Information"]) {
        this.logger.warn(
          `Alpha Vantage rate limit or info: ${
            data["Note"] || data["Information"]
          }`
        );
      }

      const exchangeRate = data["Realtime Currency Exchange Rate"];
      if (!exchangeRate) {
        this.logger.warn(`No exchange rate data for ${refFiat} → ${fiat}`);
        return null;
      }

      return {
        bid: exchangeRate["8. Bid Price"],
        ask: exchangeRate["9. Ask Price"],
        mid: exchangeRate["5. Exchange Rate"],
      };
    } catch (error) {
      logProviderError(
        this.logger,
        `${refFiat} → ${fiat} from Alpha Vantage`,
        error
      );
      return null;
    }
  }
}
