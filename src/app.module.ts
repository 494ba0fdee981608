import { Module } from "@nestjs/common";
import { ScheduleModule } from "@nestjs/schedule";
import { AppController } from "./app.controller";
import { AppConfigModule } from "./app.config.module";
import { PremiumsModule } from "./premiums/premiums.module";

@Module({
  imports: [AppConfigModule, ScheduleModule.forRoot(), PremiumsModule.register()],
  controllers: [AppController],
})
export class AppModule {}
