import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";
import {
  buildDirectionsUrl,
  distanceMilesBetween,
  estimateSecondsBetween,
  formatDuration,
  isCoordinate,
} from "../geo/geo.helper";
import type { Coordinate } from "../geo/geo.interface";
import { type ProviderAdapter, ProviderChain } from "../geo/provider-chain";
import { isRouteReasonable } from "../geo/route-plausibility.helper";
import { RoutingService } from "../geo/routing/routing.service";
import { type EtaSettings, readEtaSettings } from "./trip-estimate.config";
import { ETA_FLAG_REASONS, ETA_SOURCES, ETA_UNRESOLVED_STATE } from "./trip-estimate.const";
import { adjustInflatedEta, arrivalAfter, estimateTripCost } from "./trip-estimate.helper";
import type { EtaComputation, EtaFlagReason, ResolvedEta, Trip } from "./trip-estimate.interface";

type EtaSourceName = "persisted" | "computed";

/**
 * ETA reconciliation: a persisted value wins without any network call, then a
 * routed duration that passes the plausibility check, then the great-circle
 * estimate. Nothing here throws for a missing ETA; it is a displayable state.
 */
@Injectable()
export class EtaService {
  private readonly logger = new Logger(EtaService.name);
  private readonly settings: EtaSettings;
  private readonly sources: ProviderChain<Trip, EtaComputation, EtaSourceName>;

  constructor(
    configService: ConfigService<EnvConfig>,
    private readonly routingService: RoutingService,
  ) {
    this.settings = readEtaSettings(configService);

    const persisted: ProviderAdapter<Trip, EtaComputation, EtaSourceName> = {
      name: "persisted",
      attempt: async (trip) => readPersistedEta(trip),
    };
    const computed: ProviderAdapter<Trip, EtaComputation, EtaSourceName> = {
      name: "computed",
      attempt: (trip) => this.computeForTrip(trip),
    };

    this.sources = new ProviderChain("eta", [persisted, computed]);
  }

  get flagThresholdSeconds(): number {
    return this.settings.flagThresholdSeconds;
  }

  async resolveEta(trip: Trip): Promise<ResolvedEta> {
    const greatCircleMiles = distanceMilesBetween(trip.originCoordinate, trip.destinationCoordinate);
    const directionsUrl = buildDirectionsUrl({
      origin: trip.origin,
      destination: trip.destination,
      originCoordinate: trip.originCoordinate,
      destinationCoordinate: trip.destinationCoordinate,
    });

    const resolved = await this.sources.resolve(trip);
    if (!resolved) {
      return {
        state: ETA_UNRESOLVED_STATE,
        etaSeconds: null,
        etaHuman: null,
        etaArrival: null,
        flagged: false,
        flagReasons: [],
        adjusted: null,
        greatCircleMiles,
        routeDistanceMeters: null,
        routeProvider: null,
        cost: null,
        directionsUrl,
      };
    }

    const eta = resolved.result;
    const flagReasons: EtaFlagReason[] = [];

    if (eta.seconds > this.settings.flagThresholdSeconds) {
      flagReasons.push(ETA_FLAG_REASONS.LONG_ETA);
    }
    if (eta.routeRejected) {
      flagReasons.push(ETA_FLAG_REASONS.IMPLAUSIBLE_ROUTE);
    }

    const adjusted = adjustInflatedEta(
      eta.seconds,
      greatCircleMiles,
      estimateSecondsBetween(trip.originCoordinate, trip.destinationCoordinate),
      trip.departTime,
      this.settings,
    );
    if (adjusted) {
      flagReasons.push(ETA_FLAG_REASONS.DISPLAY_ADJUSTED);
    }

    return {
      state: eta.source,
      etaSeconds: eta.seconds,
      etaHuman: formatDuration(eta.seconds),
      etaArrival: arrivalAfter(trip.departTime, eta.seconds),
      flagged: flagReasons.length > 0,
      flagReasons,
      adjusted,
      greatCircleMiles,
      routeDistanceMeters: eta.routeDistanceMeters,
      routeProvider: eta.routeProvider,
      cost:
        eta.routeDistanceMeters === null
          ? null
          : estimateTripCost(eta.routeDistanceMeters, trip.seats, this.settings),
      directionsUrl,
    };
  }

  /**
   * Resolve a list of trips one after another, in input order
   */
  async resolveMany(trips: ReadonlyArray<Trip>): Promise<ResolvedEta[]> {
    const resolved: ResolvedEta[] = [];
    for (const trip of trips) {
      resolved.push(await this.resolveEta(trip));
    }
    return resolved;
  }

  /**
   * Route origin to destination, keeping the routed duration only if it is
   * plausible for the straight-line distance. Null when neither a route nor an
   * estimate is available.
   */
  async computeEta(from: Coordinate, to: Coordinate): Promise<EtaComputation | null> {
    const routed = await this.routingService.routeAnyWithProvider([from, to]);
    const durationSeconds = routed?.route.durationSeconds ?? null;

    if (routed && durationSeconds !== null && isRouteReasonable(routed.route, from, to)) {
      return {
        seconds: Math.round(durationSeconds),
        source: ETA_SOURCES.ROUTED,
        routeDistanceMeters: routed.route.distanceMeters,
        routeProvider: routed.provider,
        routeRejected: false,
      };
    }

    const routeRejected = durationSeconds !== null;
    if (routeRejected) {
      this.logger.warn(
        `Rejected implausible ${routed?.provider ?? "unknown"} route of ${durationSeconds}s, using great-circle estimate`,
      );
    }

    const estimate = estimateSecondsBetween(from, to);
    if (estimate === null) {
      return null;
    }

    return {
      seconds: estimate,
      source: ETA_SOURCES.ESTIMATED,
      routeDistanceMeters: null,
      routeProvider: null,
      routeRejected,
    };
  }

  private async computeForTrip(trip: Trip): Promise<EtaComputation | null> {
    const from = trip.originCoordinate;
    const to = trip.destinationCoordinate;

    if (!isCoordinate(from) || !isCoordinate(to)) {
      return null;
    }

    return this.computeEta(from, to);
  }
}

function readPersistedEta(trip: Trip): EtaComputation | null {
  if (trip.etaSeconds == null) {
    return null;
  }

  return {
    seconds: trip.etaSeconds,
    source: ETA_SOURCES.PERSISTED,
    routeDistanceMeters: null,
    routeProvider: null,
    routeRejected: false,
  };
}
