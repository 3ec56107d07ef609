import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { CommandsModule } from "./commands/commands.module";
import { validateEnvironment } from "./config/env.config";
import { GeoModule } from "./modules/geo/geo.module";
import { HttpClientModule } from "./modules/http-client/http-client.module";
import { TripEstimateModule } from "./modules/trip-estimate/trip-estimate.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    HttpClientModule,
    GeoModule,
    TripEstimateModule,
    CommandsModule,
  ],
})
export class AppModule {}
