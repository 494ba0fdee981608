import { Command, InvalidArgumentError, Option } from "commander";
import { OutputFormat } from "../premiums/formatters";
import { PremiumRecord } from "../types/premiums/premiums";

export interface CliOptions {
  fiats: string[];
  asset?: string;
  refFiat?: string;
  minValidAds?: number;
  decimals?: number;
  output: OutputFormat;
  pretty: boolean;
  logLevel: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function integerAtLeast(min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

export function buildProgram(): Command {
  return new Command()
    .name("stablecoin-premiums")
    .description(
      "Fetch P2P quotes and FX rates to compute stablecoin premiums."
    )
    .option(
      "--fiats <codes>",
      "fiat codes, comma-separated or repeated (default: DEFAULT_FIATS or MXN)",
      collect,
      []
    )
    .option("--asset <asset>", "stablecoin asset (default: DEFAULT_ASSET or USDT)")
    .option("--ref-fiat <fiat>", "reference fiat for FX (default: REF_FIAT or USD)")
    .option(
      "--min-valid-ads <n>",
      "require at least this many valid ads per side",
      integerAtLeast(1)
    )
    .option(
      "--decimals <n>",
      "round computed metrics to this many decimals",
      integerAtLeast(0)
    )
    .addOption(
      new Option("--output <format>", "output format")
        .choices(["json", "csv"])
        .default("json")
    )
    .option("--pretty", "pretty-print JSON output", false)
    .option(
      "--log-level <level>",
      "error, warn, log, debug or verbose (logs other than errors go to stdout)",
      "error"
    );
}

/**
 * Parse user arguments (without the node and script entries).
 */
export function parseCliOptions(args: string[]): CliOptions {
  const program = buildProgram().exitOverride();
  program.parse(args, { from: "user" });
  return program.opts<CliOptions>();
}

/**
 * 1 when any market could not be computed, else 0.
 */
export function exitCodeFor(records: readonly PremiumRecord[]): number {
  return records.some((record) => record.status !== "ok") ? 1 : 0;
}
