import { ConfigModule } from "@nestjs/config";
import {
  appConfig,
  premiumsConfig,
  providersConfig,
  snapshotConfig,
} from "./config/configuration";
import { validateEnv } from "./config/env.validation";

export const AppConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  load: [appConfig, premiumsConfig, providersConfig, snapshotConfig],
  validate: validateEnv,
});
