import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
} from "@nestjs/common";
import { QuoteOrchestrator } from "./quote-orchestrator.service";
import { PremiumSnapshotStore } from "./premium-snapshot.store";
import { computePremiums, InvalidRateError } from "./premium-calculator";
import { PREMIUMS_CONFIG } from "./premium-providers";
import { resolveFiats } from "./fiats";
import { PremiumsConfig } from "../config/configuration";
import {
  LatestPremiumQuery,
  PremiumQuery,
  PremiumsQuery,
} from "../dto/PremiumsQuery";
import { ComputePremiumsRequest } from "../dto/ComputePremiumsRequest";
import { PremiumRecord, PremiumResult } from "../types/premiums/premiums";

const FIAT_CODE = /^[A-Za-z]{3}$/;

@Controller("premiums")
export class PremiumsController {
  constructor(
    private readonly orchestrator: QuoteOrchestrator,
    private readonly snapshots: PremiumSnapshotStore,
    @Inject(PREMIUMS_CONFIG) private readonly config: PremiumsConfig
  ) {}

  /**
   * Premiums for several fiats.
   * Example: GET /premiums?fiats=MXN,BRL&asset=USDT&refFiat=USD
   */
  @Get()
  async getPremiums(@Query() query: PremiumsQuery): Promise<PremiumRecord[]> {
    const fiats = resolveFiats(query.fiats, this.config.defaultFiats);
    return this.orchestrator.collectMany(fiats, {
      asset: query.asset,
      refFiat: query.refFiat,
      minValidAds: query.minValidAds,
      decimals: query.decimals,
    });
  }

  /**
   * Pure calculation over caller-supplied rates; no provider calls.
   */
  @Post("compute")
  @HttpCode(200)
  compute(@Body() request: ComputePremiumsRequest): PremiumResult {
    try {
      return computePremiums(
        {
          sellRate: request.sellRate,
          buyRate: request.buyRate,
          fxBid: request.fxBid,
          fxAsk: request.fxAsk,
        },
        { decimals: request.decimals }
      );
    } catch (error) {
      if (error instanceof InvalidRateError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  /**
   * Last cached snapshot for a fiat, as written by the refresh job.
   */
  @Get(":fiat/latest")
  async getLatest(
    @Param("fiat") fiat: string,
    @Query() query: LatestPremiumQuery
  ): Promise<PremiumRecord> {
    this.assertFiat(fiat);
    const asset = (query.asset ?? this.config.defaultAsset).toUpperCase();
    const refFiat = (query.refFiat ?? this.config.refFiat).toUpperCase();

    const snapshot = await this.snapshots.get(
      asset,
      fiat.toUpperCase(),
      refFiat
    );
    if (!snapshot) {
      throw new NotFoundException(
        `No cached premium snapshot for ${asset}/${fiat.toUpperCase()} vs ${refFiat}`
      );
    }
    return snapshot;
  }

  @Get(":fiat")
  async getPremium(
    @Param("fiat") fiat: string,
    @Query() query: PremiumQuery
  ): Promise<PremiumRecord> {
    this.assertFiat(fiat);
    return this.orchestrator.collect({
      fiat,
      asset: query.asset,
      refFiat: query.refFiat,
      minValidAds: query.minValidAds,
      decimals: query.decimals,
    });
  }

  private assertFiat(fiat: string): void {
    if (!FIAT_CODE.test(fiat)) {
      throw new BadRequestException("fiat must be a 3-letter currency code");
    }
  }
}
