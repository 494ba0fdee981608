import { INestApplication, ValidationPipe } from "@nestjs/common";

export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
    })
  );
  app.enableShutdownHooks();
  return app;
}
