import { Injectable } from "@nestjs/common";
import { estimateSecondsBetween, formatDuration, isCoordinate } from "../geo/geo.helper";
import type { Coordinate } from "../geo/geo.interface";
import { RoutingService } from "../geo/routing/routing.service";
import type { DetourEstimate, Trip } from "./trip-estimate.interface";

const NO_DETOUR_ESTIMATE: DetourEstimate = { addedSeconds: null, addedHuman: null };

/**
 * Extra driving time for picking a rider up on the way. The base route is
 * always requested before the route through the pickup.
 */
@Injectable()
export class DetourService {
  constructor(private readonly routingService: RoutingService) {}

  async addedTime(trip: Trip, pickup: Coordinate): Promise<DetourEstimate> {
    const origin = trip.originCoordinate;
    const destination = trip.destinationCoordinate;

    if (!isCoordinate(origin) || !isCoordinate(destination)) {
      return NO_DETOUR_ESTIMATE;
    }

    const baseSeconds = await this.baseDuration(origin, destination);
    const detourSeconds = await this.detourDuration(origin, pickup, destination);

    if (baseSeconds === null || detourSeconds === null) {
      return NO_DETOUR_ESTIMATE;
    }

    // A detour never shortens the trip; a negative delta is rounding between providers
    const addedSeconds = Math.max(0, Math.round(detourSeconds - baseSeconds));

    return { addedSeconds, addedHuman: formatDuration(addedSeconds) };
  }

  private async baseDuration(origin: Coordinate, destination: Coordinate): Promise<number | null> {
    const route = await this.routingService.routeAny([origin, destination]);
    return route?.durationSeconds ?? estimateSecondsBetween(origin, destination);
  }

  private async detourDuration(
    origin: Coordinate,
    pickup: Coordinate,
    destination: Coordinate,
  ): Promise<number | null> {
    const route = await this.routingService.routeAny([origin, pickup, destination]);
    if (route?.durationSeconds != null) {
      return route.durationSeconds;
    }

    const toPickup = estimateSecondsBetween(origin, pickup);
    const toDestination = estimateSecondsBetween(pickup, destination);
    return toPickup === null || toDestination === null ? null : toPickup + toDestination;
  }
}
