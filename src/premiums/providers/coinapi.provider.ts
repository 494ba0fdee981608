import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { FxProvider } from "../premium-providers";
import { FxQuoteResponse, RawRate } from "../../types/premiums/fx";
import { logProviderError } from "./provider-errors";

interface CoinApiExchangeRateResponse {
  time?: string;
  asset_id_base?: string;
  asset_id_quote?: string;
  rate?: RawRate;
  error?: string;
}

export interface CoinApiProviderOptions {
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * CoinAPI reference exchange rate. Single rate only, exposed as mid.
 */
@Injectable()
export class CoinApiProvider implements FxProvider {
  private readonly logger = new Logger(CoinApiProvider.name);
  readonly venueId = "fx:coinapi";

  constructor(private readonly options: CoinApiProviderOptions) {
    if (!options.apiKey) {
      this.logger.warn(
        "CoinAPI key not configured (COINAPI_KEY). FX rates will be unavailable."
      );
    }
  }

  async fetchFx(
    fiat: string,
    refFiat: string
  ): Promise<FxQuoteResponse | null> {
    const { apiKey } = this.options;
    if (!apiKey) return null;

    const baseUrl = this.options.baseUrl.replace(/\/+$/, "");

    try {
      const response = await axios.get<CoinApiExchangeRateResponse>(
        `${baseUrl}/v1/exchangerate/${refFiat}/${fiat}`,
        {
          headers: { Accept: "application/json", "X-CoinAPI-Key": apiKey },
          timeout: this.options.timeoutMs,
        }
      );

      if (response.data?.error) {
        this.logger.error(
          `CoinAPI error for ${refFiat} → ${fiat}: ${response.data.error}`
        );
        return null;
      }

      return { mid: response.data?.rate };
    } catch (error) {
      logProviderError(this.logger, `${refFiat} → ${fiat} from CoinAPI`, error);
      return null;
    }
  }
}
