#!/usr/bin/env node
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { CliModule } from "./cli.module";
import { exitCodeFor, parseCliOptions } from "./cli/options";
import { PremiumsConfig } from "./config/configuration";
import { resolveLogLevels } from "./config/logging";
import { formatRecords } from "./premiums/formatters";
import { resolveFiats } from "./premiums/fiats";
import { PREMIUMS_CONFIG } from "./premiums/premium-providers";
import { QuoteOrchestrator } from "./premiums/quote-orchestrator.service";
import { errorMessage } from "./premiums/providers/provider-errors";

async function run(args: string[]): Promise<number> {
  const options = parseCliOptions(args);

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: resolveLogLevels(options.logLevel, "error"),
  });

  try {
    const config = app.get<PremiumsConfig>(PREMIUMS_CONFIG);
    const orchestrator = app.get(QuoteOrchestrator);

    const records = await orchestrator.collectMany(
      resolveFiats(options.fiats, config.defaultFiats),
      {
        asset: options.asset,
        refFiat: options.refFiat,
        minValidAds: options.minValidAds,
        decimals: options.decimals,
      }
    );

    process.stdout.write(formatRecords(records, options.output, options.pretty));
    return exitCodeFor(records);
  } finally {
    await app.close();
  }
}

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof Error && "exitCode" in error) {
      // commander already printed usage or help
      process.exitCode = typeof error.exitCode === "number" ? error.exitCode : 2;
      return;
    }
    new Logger("Cli").error(errorMessage(error));
    process.exitCode = 2;
  });
