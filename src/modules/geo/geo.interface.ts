import type { GEOCODING_PROVIDERS, ROUTING_PROVIDERS } from "./geo.const";

export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * Road distance/duration from a routing provider. A null field means the
 * provider answered without that metric.
 */
export interface RouteResult {
  distanceMeters: number | null;
  durationSeconds: number | null;
}

export type GeocodingProviderName = (typeof GEOCODING_PROVIDERS)[keyof typeof GEOCODING_PROVIDERS];
export type RoutingProviderName = (typeof ROUTING_PROVIDERS)[keyof typeof ROUTING_PROVIDERS];

export interface GeocodeResult {
  coordinate: Coordinate;
  provider: GeocodingProviderName;
}

export interface RouteWithProvider {
  route: RouteResult;
  provider: RoutingProviderName;
}

export interface DirectionsLinkInput {
  origin?: string | null;
  destination?: string | null;
  originCoordinate?: Coordinate | null;
  destinationCoordinate?: Coordinate | null;
}
