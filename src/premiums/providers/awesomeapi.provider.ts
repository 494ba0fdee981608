import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { FxProvider } from "../premium-providers";
import { FxQuoteResponse } from "../../types/premiums/fx";
import { logProviderError } from "./provider-errors";

interface AwesomeApiRate {
  code: string;
  codein: string;
  name: string;
  high: string;
  low: string;
  varBid: string;
  pctChange: string;
  bid: string;
  ask: string;
  timestamp: string;
  create_date: string;
}

type AwesomeApiResponse = Record<string, AwesomeApiRate | undefined>;

export interface AwesomeApiProviderOptions {
  timeoutMs: number;
}

/**
 * AwesomeAPI public FX endpoint. Two-sided quotes, no API key.
 * e.g. https://economia.awesomeapi.com.br/last/USD-BRL
 */
@Injectable()
export class AwesomeApiProvider implements FxProvider {
  private readonly logger = new Logger(AwesomeApiProvider.name);
  readonly venueId = "fx:awesomeapi";

  private readonly baseUrl = "https://economia.awesomeapi.com.br/last";

  constructor(private readonly options: AwesomeApiProviderOptions) {}

  async fetchFx(
    fiat: string,
    refFiat: string
  ): Promise<FxQuoteResponse | null> {
    try {
      const response = await axios.get<AwesomeApiResponse>(
        `${this.baseUrl}/${refFiat}-${fiat}`,
        { timeout: this.options.timeoutMs }
      );

      // Keyed without the dash: USDBRL, USDMXN, ...
      const rate = response.data?.[`${refFiat}${fiat}`];
      if (!rate) {
        this.logger.warn(`No AwesomeAPI rate data for ${refFiat} → ${fiat}`);
        return null;
      }

      return { bid: rate.bid, ask: rate.ask };
    } catch (error) {
      logProviderError(
        this.logger,
        `${refFiat} → ${fiat} from AwesomeAPI`,
        error
      );
      return null;
    }
  }
}
