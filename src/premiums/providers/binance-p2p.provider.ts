import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { AdsProvider } from "../premium-providers";
import { Ad, TradeSide } from "../../types/premiums/ads";
import { HttpConfig } from "../../config/configuration";
import { logProviderError } from "./provider-errors";

type NumericField = string | number | null;

interface BinanceP2PAdv {
  price?: NumericField;
  minSingleTransAmount?: NumericField;
  maxSingleTransAmount?: NumericField;
  tradableQuantity?: NumericField;
  tradeMethods?: Array<{ identifier?: string; tradeMethodName?: string } | null>;
}

interface BinanceP2PItem {
  adv?: BinanceP2PAdv;
  advertiser?: { nickName?: string };
}

interface BinanceP2PResponse {
  code?: string;
  message?: string | null;
  data?: Array<BinanceP2PItem | null> | null;
  success?: boolean;
}

export interface BinanceP2POptions extends HttpConfig {
  /** Ads requested per side */
  rows: number;
}

const DEFAULT_HEADERS = {
  Accept: "*/*",
  "Content-Type": "application/json",
  "User-Agent": "Mozilla/5.0 (compatible; stablecoin-premiums/0.1)",
};

function toNumber(value: NumericField | undefined): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value !== "string" || value.trim() === "") return undefined;
  return Number(value);
}

/**
 * Binance C2C order book. Public, undocumented endpoint: stability is not
 * guaranteed and the payload is mapped loosely.
 */
@Injectable()
export class BinanceP2PProvider implements AdsProvider {
  private readonly logger = new Logger(BinanceP2PProvider.name);
  readonly venueId = "p2p:binance";

  private readonly searchUrl =
    "https://p2p.binance.com/bapi/c2c/v2/friendly/c2c/adv/search";

  constructor(private readonly options: BinanceP2POptions) {}

  async fetchAds(
    fiat: string,
    asset: string,
    side: TradeSide
  ): Promise<Ad[] | null> {
    const payload = {
      fiat,
      page: 1,
      rows: this.options.rows,
      asset,
      tradeType: side,
      payTypes: [],
      countries: [],
    };
    const attempts = Math.max(1, this.options.maxRetries);
    const context = `${side} ads for ${asset}/${fiat} from Binance P2P`;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const response = await axios.post<BinanceP2PResponse>(
          this.searchUrl,
          payload,
          { headers: DEFAULT_HEADERS, timeout: this.options.timeoutMs }
        );

        const items = response.data?.data ?? [];
        if (!Array.isArray(items)) {
          this.logger.warn(`Malformed payload for ${context}`);
          return null;
        }

        const ads = items.flatMap((item) => {
          const ad = this.toAd(item, side);
          return ad ? [ad] : [];
        });
        this.logger.debug(`Fetched ${ads.length} ${context}`);
        return ads;
      } catch (error) {
        logProviderError(
          this.logger,
          `${context} (attempt ${attempt}/${attempts})`,
          error
        );
        // Only transport failures are worth another attempt
        if (!axios.isAxiosError(error)) return null;
        if (attempt < attempts) {
          await this.delay(this.options.retrySleepMs);
        }
      }
    }

    return null;
  }

  private toAd(item: BinanceP2PItem | null, side: TradeSide): Ad | null {
    if (!item || typeof item !== "object") return null;
    const adv = item.adv;
    if (!adv || typeof adv !== "object") return null;

    const methods = Array.isArray(adv.tradeMethods) ? adv.tradeMethods : [];
    const paymentMethods = methods.flatMap((method) =>
      method?.identifier ? [method.identifier] : []
    );

    return {
      side,
      price: toNumber(adv.price) ?? Number.NaN,
      minAmount: toNumber(adv.minSingleTransAmount),
      maxAmount: toNumber(adv.maxSingleTransAmount),
      availableQuantity: toNumber(adv.tradableQuantity),
      paymentMethods,
      advertiser: item.advertiser?.nickName,
    };
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
