import { Controller, Get, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ZodBody, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { GeocodingService } from "../geo/geocoding/geocoding.service";
import type { Coordinate, GeocodingProviderName } from "../geo/geo.interface";
import { type DetourBodyDto, detourBodySchema } from "./dto/detour.dto";
import { type GeocodeQueryDto, geocodeQuerySchema } from "./dto/geocode-query.dto";
import { type LocateTripBodyDto, locateTripBodySchema } from "./dto/locate-trip.dto";
import { type TripDto, tripSchema } from "./dto/trip.dto";
import { DetourService } from "./detour.service";
import { EtaService } from "./eta.service";
import type { DetourEstimate, ResolvedEta, TripLocationUpdate } from "./trip-estimate.interface";
import { TripLocatorService } from "./trip-locator.service";

interface GeocodeResponse {
  coordinate: Coordinate | null;
  provider: GeocodingProviderName | null;
}

@Controller("api")
export class TripEstimateController {
  constructor(
    private readonly geocodingService: GeocodingService,
    private readonly etaService: EtaService,
    private readonly detourService: DetourService,
    private readonly tripLocatorService: TripLocatorService,
  ) {}

  @Get("geocode")
  async geocode(@ZodQuery(geocodeQuerySchema) query: GeocodeQueryDto): Promise<GeocodeResponse> {
    const result = await this.geocodingService.geocodeAny(query.address);
    return result ?? { coordinate: null, provider: null };
  }

  @Post("trips/eta")
  @HttpCode(HttpStatus.OK)
  async resolveEta(@ZodBody(tripSchema) trip: TripDto): Promise<ResolvedEta> {
    return this.etaService.resolveEta(trip);
  }

  @Post("trips/detour")
  @HttpCode(HttpStatus.OK)
  async addedTime(@ZodBody(detourBodySchema) body: DetourBodyDto): Promise<DetourEstimate> {
    return this.detourService.addedTime(body.trip, body.pickup);
  }

  @Post("trips/locate")
  @HttpCode(HttpStatus.OK)
  async locate(@ZodBody(locateTripBodySchema) body: LocateTripBodyDto): Promise<TripLocationUpdate> {
    const { regeocode, ...trip } = body;
    return this.tripLocatorService.locate(trip, { regeocode });
  }
}
