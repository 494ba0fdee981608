import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { AppConfig } from "./config/configuration";
import { resolveLogLevels } from "./config/logging";
import { errorMessage } from "./premiums/providers/provider-errors";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  configureApp(app);

  const { port } = app.get(ConfigService).getOrThrow<AppConfig>("app");
  await app.listen(port);
  new Logger("Bootstrap").log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(`Failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
