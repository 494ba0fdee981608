import { IsInt, IsNumber, IsOptional, Max, Min } from "class-validator";

/**
 * Raw inputs for the premium calculator. A null or missing rate yields an
 * `insufficient_data` result.
 */
export class ComputePremiumsRequest {
  @IsOptional()
  @IsNumber()
  sellRate?: number | null;

  @IsOptional()
  @IsNumber()
  buyRate?: number | null;

  @IsOptional()
  @IsNumber()
  fxBid?: number | null;

  @IsOptional()
  @IsNumber()
  fxAsk?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(12)
  decimals?: number;
}
