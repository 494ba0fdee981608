import { Module } from "@nestjs/common";
import { AppConfigModule } from "./app.config.module";
import { PremiumsModule } from "./premiums/premiums.module";

/**
 * Application context for one-shot CLI runs: no HTTP server, no scheduler.
 */
@Module({
  imports: [AppConfigModule, PremiumsModule.register()],
})
export class CliModule {}
