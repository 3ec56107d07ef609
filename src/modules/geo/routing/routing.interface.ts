import type { Coordinate, RouteResult, RoutingProviderName } from "../geo.interface";
import type { ProviderAdapter } from "../provider-chain";

/**
 * A driving-directions adapter: ordered coordinates (at least two) in, road
 * distance/duration (or null) out
 */
export type RoutingProvider = ProviderAdapter<ReadonlyArray<Coordinate>, RouteResult, RoutingProviderName>;
