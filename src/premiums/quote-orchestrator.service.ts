import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  ADS_PROVIDER,
  AdsProvider,
  FX_PROVIDER,
  FxProvider,
  PREMIUMS_CONFIG,
} from "./premium-providers";
import { filterAds, paymentMethodPredicate } from "./ad-filter";
import { aggregateRate } from "./rate-aggregator";
import { normalizeFx } from "./fx-normalizer";
import { computePremiums } from "./premium-calculator";
import { resolveFiats } from "./fiats";
import { PremiumsConfig } from "../config/configuration";
import {
  Ad,
  AdFilterOptions,
  AggregatedRate,
  TradeSide,
} from "../types/premiums/ads";
import { FxQuoteResponse } from "../types/premiums/fx";
import { PremiumError, PremiumRecord } from "../types/premiums/premiums";
import { errorMessage } from "./providers/provider-errors";

export interface CollectOptions {
  asset?: string;
  refFiat?: string;
  minValidAds?: number;
  decimals?: number | null;
}

export interface CollectRequest extends CollectOptions {
  fiat: string;
}

@Injectable()
export class QuoteOrchestrator {
  private readonly logger = new Logger(QuoteOrchestrator.name);
  private readonly filterOptions: AdFilterOptions;

  constructor(
    @Inject(ADS_PROVIDER) private readonly adsProvider: AdsProvider,
    @Inject(FX_PROVIDER) private readonly fxProvider: FxProvider,
    @Inject(PREMIUMS_CONFIG) private readonly config: PremiumsConfig
  ) {
    this.filterOptions = {
      minAmount: config.minTradeAmount,
      maxAmount: config.maxTradeAmount,
      accept:
        config.paymentMethods.length > 0
          ? paymentMethodPredicate(config.paymentMethods)
          : undefined,
    };
  }

  /**
   * Fetch both sides of the P2P book and the FX reference concurrently, then
   * compute premiums. Missing data of any kind ends in `insufficient_data`;
   * only an invalid-rate contract violation is thrown.
   */
  async collect(request: CollectRequest): Promise<PremiumRecord> {
    const fiat = request.fiat.toUpperCase();
    const asset = (request.asset ?? this.config.defaultAsset).toUpperCase();
    const refFiat = (request.refFiat ?? this.config.refFiat).toUpperCase();
    const minValidAds = request.minValidAds ?? this.config.minValidAds;
    const decimals =
      request.decimals === undefined ? this.config.decimals : request.decimals;
    const market = `${asset}/${fiat}`;

    const [buyAds, sellAds, fxQuote] = await Promise.allSettled([
      this.adsProvider.fetchAds(fiat, asset, "BUY"),
      this.adsProvider.fetchAds(fiat, asset, "SELL"),
      this.fxProvider.fetchFx(fiat, refFiat),
    ]);

    const buy = this.aggregateSide(buyAds, "BUY", minValidAds, market);
    const sell = this.aggregateSide(sellAds, "SELL", minValidAds, market);
    const fx = normalizeFx(
      this.settledValue<FxQuoteResponse>(
        fxQuote,
        `${refFiat} → ${fiat} FX (${this.fxProvider.venueId})`
      )
    );

    const result = computePremiums(
      {
        sellRate: sell?.value,
        buyRate: buy?.value,
        fxBid: fx?.bid,
        fxAsk: fx?.ask,
      },
      { decimals }
    );

    let error: PremiumError | null = null;
    if (!buy || !sell) {
      error = "insufficient_p2p_data";
      this.logger.debug(`Insufficient P2P data for ${market}`);
    } else if (!fx) {
      error = "insufficient_fx_data";
      this.logger.debug(`Insufficient FX data for ${fiat}/${refFiat}`);
    }

    return {
      fiat,
      asset,
      ref_fiat: refFiat,
      sell_rate: sell?.value ?? null,
      buy_rate: buy?.value ?? null,
      fx: fx ? { bid: fx.bid, ask: fx.ask } : null,
      stablecoin_sell_premium: result.sellPremium,
      stablecoin_buy_premium: result.buyPremium,
      stablecoin_buy_sell_spread: result.buySellSpread,
      status: result.status,
      error,
    };
  }

  /**
   * Collect several fiats concurrently. Duplicates are dropped; output
   * follows the first-seen order of the input.
   */
  async collectMany(
    fiats: readonly string[],
    options: CollectOptions = {}
  ): Promise<PremiumRecord[]> {
    const unique = resolveFiats(fiats, this.config.defaultFiats);
    return Promise.all(unique.map((fiat) => this.collect({ ...options, fiat })));
  }

  private aggregateSide(
    settled: PromiseSettledResult<Ad[] | null>,
    side: TradeSide,
    minValidAds: number,
    market: string
  ): AggregatedRate | null {
    const context = `${side} ads for ${market} (${this.adsProvider.venueId})`;
    const ads = this.settledValue<Ad[]>(settled, context);
    if (!ads) return null;

    const accepted = filterAds(ads, this.filterOptions);
    const rate = aggregateRate(accepted, side, minValidAds);
    if (!rate) {
      this.logger.debug(
        `${context}: ${accepted.length}/${ads.length} usable, need ${minValidAds}`
      );
    }
    return rate;
  }

  private settledValue<T>(
    settled: PromiseSettledResult<T | null>,
    context: string
  ): T | null {
    if (settled.status === "rejected") {
      this.logger.warn(
        `Fetching ${context} failed: ${errorMessage(settled.reason)}`
      );
      return null;
    }
    if (settled.value === null) {
      this.logger.warn(`No data for ${context}`);
    }
    return settled.value;
  }
}
