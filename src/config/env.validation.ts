import { plainToInstance, Type } from "class-transformer";
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { FX_PROVIDER_NAMES } from "./configuration";

const BINANCE_MAX_ROWS = 20;

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsIn(["error", "warn", "log", "debug", "verbose"])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  DEFAULT_ASSET?: string;

  @IsOptional()
  @IsString()
  REF_FIAT?: string;

  @IsOptional()
  @IsString()
  DEFAULT_FIATS?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  MIN_VALID_ADS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  MIN_TRADE_AMOUNT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  MAX_TRADE_AMOUNT?: number;

  @IsOptional()
  @IsString()
  PAYMENT_METHODS?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(12)
  DECIMALS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(BINANCE_MAX_ROWS)
  P2P_ROWS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  REQUEST_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  MAX_RETRIES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  RETRY_SLEEP_MS?: number;

  @IsOptional()
  @IsIn([...FX_PROVIDER_NAMES])
  FX_PROVIDER?: string;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1000)
  SNAPSHOT_TTL_MS?: number;

  @IsOptional()
  @IsIn(["true", "false"])
  SNAPSHOT_REFRESH_ENABLED?: string;
}

// Blank values are unset, though @Type turns them into 0
function isSet(raw: unknown): boolean {
  return typeof raw === "string" ? raw.trim() !== "" : raw !== undefined;
}

// Settings that pass on their own but can never yield a premium together
function crossFieldErrors(
  env: EnvironmentVariables,
  raw: Record<string, unknown>
): string[] {
  const errors: string[] = [];
  const rows =
    isSet(raw.P2P_ROWS) && env.P2P_ROWS !== undefined
      ? env.P2P_ROWS
      : BINANCE_MAX_ROWS;

  if (
    isSet(raw.MIN_VALID_ADS) &&
    env.MIN_VALID_ADS !== undefined &&
    env.MIN_VALID_ADS > rows
  ) {
    errors.push(
      `MIN_VALID_ADS (${env.MIN_VALID_ADS}) must not exceed P2P_ROWS (${rows})`
    );
  }
  if (
    isSet(raw.MIN_TRADE_AMOUNT) &&
    isSet(raw.MAX_TRADE_AMOUNT) &&
    env.MIN_TRADE_AMOUNT !== undefined &&
    env.MAX_TRADE_AMOUNT !== undefined &&
    env.MIN_TRADE_AMOUNT > env.MAX_TRADE_AMOUNT
  ) {
    errors.push("MIN_TRADE_AMOUNT must not exceed MAX_TRADE_AMOUNT");
  }
  return errors;
}

/**
 * `validate` hook for ConfigModule: fails boot on malformed settings.
 */
export function validateEnv(
  config: Record<string, unknown>
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  const details = errors.map((error) =>
    Object.values(error.constraints ?? {}).join(", ")
  );
  if (errors.length === 0) details.push(...crossFieldErrors(validated, config));

  if (details.length > 0) {
    throw new Error(`Invalid environment configuration: ${details.join("; ")}`);
  }

  return validated;
}
