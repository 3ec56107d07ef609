import { Injectable, Logger } from "@nestjs/common";
import type { Coordinate, RouteResult, RouteWithProvider, RoutingProviderName } from "../geo.interface";
import { ProviderChain } from "../provider-chain";
import { MapboxRoutingProvider } from "./mapbox-routing.provider";
import { OrsRoutingProvider } from "./ors-routing.provider";
import { OsrmRoutingProvider } from "./osrm-routing.provider";
import type { RoutingProvider } from "./routing.interface";

/**
 * Road distance/duration for an ordered list of coordinates.
 *
 * Tries Mapbox, then OpenRouteService (both need credentials), then the
 * public OSRM server last so shared capacity is only used when the keyed
 * providers cannot answer.
 */
@Injectable()
export class RoutingService {
  private readonly logger = new Logger(RoutingService.name);
  private readonly chain: ProviderChain<ReadonlyArray<Coordinate>, RouteResult, RoutingProviderName>;
  private readonly providers: Record<RoutingProviderName, RoutingProvider>;

  constructor(mapbox: MapboxRoutingProvider, ors: OrsRoutingProvider, osrm: OsrmRoutingProvider) {
    this.chain = new ProviderChain("routing", [mapbox, ors, osrm]);
    this.providers = { mapbox, ors, osrm };
  }

  async route(coords: ReadonlyArray<Coordinate>, provider: RoutingProviderName): Promise<RouteResult | null> {
    return this.providers[provider].attempt(coords);
  }

  async routeAny(coords: ReadonlyArray<Coordinate>): Promise<RouteResult | null> {
    const resolved = await this.routeAnyWithProvider(coords);
    return resolved?.route ?? null;
  }

  async routeAnyWithProvider(coords: ReadonlyArray<Coordinate>): Promise<RouteWithProvider | null> {
    if (coords.length < 2) {
      return null;
    }

    const resolved = await this.chain.resolve(coords);
    if (!resolved) {
      this.logger.warn(`Routing ${coords.length} points failed with ${this.chain.providerNames.join(", ")}`);
      return null;
    }

    return { route: resolved.result, provider: resolved.provider };
  }
}
