import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { FxProvider } from "../premium-providers";
import { FxQuoteResponse, RawRate } from "../../types/premiums/fx";
import { logProviderError } from "./provider-errors";

interface XeConvertFromResponse {
  terms?: string;
  privacy?: string;
  from?: string;
  amount?: number;
  timestamp?: string;
  to?: Array<{
    quotecurrency: string;
    mid?: RawRate;
    bid?: RawRate;
    ask?: RawRate;
  }>;
}

export interface XeProviderOptions {
  accountId: string | null;
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * XE currency data API. Most plans only return a mid rate; bid/ask are
 * passed through when the account exposes them.
 */
@Injectable()
export class XeProvider implements FxProvider {
  private readonly logger = new Logger(XeProvider.name);
  readonly venueId = "fx:xe";

  constructor(private readonly options: XeProviderOptions) {
    if (!this.isConfigured()) {
      this.logger.warn(
        "XE credentials not configured (XE_API_ACCOUNT_ID / XE_API_KEY). FX rates will be unavailable."
      );
    }
  }

  isConfigured(): boolean {
    return Boolean(this.options.accountId && this.options.apiKey);
  }

  async fetchFx(
    fiat: string,
    refFiat: string
  ): Promise<FxQuoteResponse | null> {
    const { accountId, apiKey } = this.options;
    if (!accountId || !apiKey) return null;

    try {
      const response = await axios.get<XeConvertFromResponse>(
        `${this.options.baseUrl.replace(/\/+$/, "")}/v1/convert_from.json`,
        {
          params: {
            from: refFiat,
            to: fiat,
            amount: 1,
            decimal_places: 6,
          },
          auth: { username: accountId, password: apiKey },
          timeout: this.options.timeoutMs,
        }
      );

      const row = response.data?.to?.[0];
      if (!row) {
        this.logger.warn(`No XE rate data for ${refFiat} → ${fiat}`);
        return null;
      }

      return { mid: row.mid, bid: row.bid, ask: row.ask };
    } catch (error) {
      logProviderError(this.logger, `${refFiat} → ${fiat} from XE`, error);
      return null;
    }
  }
}
