import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { HttpClientModule } from "../http-client/http-client.module";
import { GeocodingService } from "./geocoding/geocoding.service";
import { MapboxGeocodingProvider } from "./geocoding/mapbox-geocoding.provider";
import { NominatimGeocodingProvider } from "./geocoding/nominatim-geocoding.provider";
import { OrsGeocodingProvider } from "./geocoding/ors-geocoding.provider";
import { MapboxRoutingProvider } from "./routing/mapbox-routing.provider";
import { OrsRoutingProvider } from "./routing/ors-routing.provider";
import { OsrmRoutingProvider } from "./routing/osrm-routing.provider";
import { RoutingService } from "./routing/routing.service";

@Module({
  imports: [ConfigModule, HttpClientModule],
  providers: [
    OrsGeocodingProvider,
    MapboxGeocodingProvider,
    NominatimGeocodingProvider,
    GeocodingService,
    MapboxRoutingProvider,
    OrsRoutingProvider,
    OsrmRoutingProvider,
    RoutingService,
  ],
  exports: [GeocodingService, RoutingService],
})
export class GeoModule {}
