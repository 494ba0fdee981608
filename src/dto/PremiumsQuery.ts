import { Transform, Type } from "class-transformer";
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  Min,
} from "class-validator";
import { splitCodes } from "../premiums/fiats";

const CURRENCY_CODE = /^[A-Za-z]{3}$/;
const ASSET_CODE = /^[A-Za-z0-9]+$/;

export class LatestPremiumQuery {
  @IsOptional()
  @IsString()
  @Length(2, 10)
  @Matches(ASSET_CODE, { message: "asset must be alphanumeric" })
  asset?: string;

  @IsOptional()
  @IsString()
  @Matches(CURRENCY_CODE, {
    message: "refFiat must be a 3-letter currency code",
  })
  refFiat?: string;
}

export class PremiumQuery extends LatestPremiumQuery {
  /** Require at least this many usable ads per side */
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  minValidAds?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(12)
  decimals?: number;
}

export class PremiumsQuery extends PremiumQuery {
  /** Comma-separated and/or repeated, e.g. ?fiats=MXN,BRL&fiats=ARS */
  @IsOptional()
  @Transform(({ value }) => splitCodes(value))
  @IsArray()
  @IsString({ each: true })
  @Matches(CURRENCY_CODE, {
    each: true,
    message: "each value in fiats must be a 3-letter currency code",
  })
  fiats?: string[];
}
