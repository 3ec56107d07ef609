import { Injectable } from "@nestjs/common";
import { GeocodingService } from "../geo/geocoding/geocoding.service";
import { isCoordinate } from "../geo/geo.helper";
import type { Coordinate, GeocodeResult } from "../geo/geo.interface";
import { EtaService } from "./eta.service";
import type { LocateOptions, Trip, TripLocationUpdate } from "./trip-estimate.interface";

/**
 * Fills in what a trip is missing: coordinates for each address, then an ETA
 * once both ends are known. Used at creation, after an edit (`regeocode`) and
 * by the backfill.
 */
@Injectable()
export class TripLocatorService {
  constructor(
    private readonly geocodingService: GeocodingService,
    private readonly etaService: EtaService,
  ) {}

  async locate(trip: Trip, options: LocateOptions = {}): Promise<TripLocationUpdate> {
    const regeocode = options.regeocode ?? false;
    const update: TripLocationUpdate = {};

    const origin = await this.geocodeIfNeeded(trip.origin, trip.originCoordinate, regeocode);
    if (origin) {
      update.originCoordinate = origin.coordinate;
      update.originProvider = origin.provider;
    }

    const destination = await this.geocodeIfNeeded(trip.destination, trip.destinationCoordinate, regeocode);
    if (destination) {
      update.destinationCoordinate = destination.coordinate;
      update.destinationProvider = destination.provider;
    }

    const from = update.originCoordinate ?? trip.originCoordinate;
    const to = update.destinationCoordinate ?? trip.destinationCoordinate;
    const needsEta = regeocode || trip.etaSeconds == null;

    if (needsEta && isCoordinate(from) && isCoordinate(to)) {
      const eta = await this.etaService.computeEta(from, to);
      if (eta) {
        update.etaSeconds = eta.seconds;
        update.etaSource = eta.source;
        update.etaUpdatedAt = new Date();
      }
    }

    return update;
  }

  private async geocodeIfNeeded(
    address: string,
    stored: Coordinate | null | undefined,
    regeocode: boolean,
  ): Promise<GeocodeResult | null> {
    if (isCoordinate(stored) && !regeocode) {
      return null;
    }

    return this.geocodingService.geocodeAny(address);
  }
}

export function hasLocationChanges(update: TripLocationUpdate): boolean {
  return Object.keys(update).length > 0;
}
