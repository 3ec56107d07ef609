import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { GeoModule } from "../geo/geo.module";
import { DetourService } from "./detour.service";
import { EtaMaintenanceService } from "./eta-maintenance.service";
import { EtaService } from "./eta.service";
import { TripEstimateController } from "./trip-estimate.controller";
import { TripLocatorService } from "./trip-locator.service";

@Module({
  imports: [ConfigModule, GeoModule],
  controllers: [TripEstimateController],
  providers: [EtaService, DetourService, TripLocatorService, EtaMaintenanceService],
  exports: [EtaService, DetourService, TripLocatorService, EtaMaintenanceService],
})
export class TripEstimateModule {}
