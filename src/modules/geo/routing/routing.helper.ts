import type { Coordinate, RouteResult } from "../geo.interface";

/**
 * "lon,lat;lon,lat" path segment used by Mapbox Directions and OSRM
 */
export function toCoordinatePath(coords: ReadonlyArray<Coordinate>): string {
  return coords.map(({ latitude, longitude }) => `${longitude},${latitude}`).join(";");
}

/**
 * [[lon, lat], ...] body used by OpenRouteService
 */
export function toLonLatPairs(coords: ReadonlyArray<Coordinate>): Array<[number, number]> {
  return coords.map(({ latitude, longitude }) => [longitude, latitude]);
}

function positiveOrNull(value: number | null | undefined): number | null {
  return value != null && Number.isFinite(value) && value > 0 ? value : null;
}

export function toRouteResult(metrics: {
  distance?: number | null;
  duration?: number | null;
}): RouteResult {
  return {
    distanceMeters: positiveOrNull(metrics.distance),
    durationSeconds: positiveOrNull(metrics.duration),
  };
}

export function hasEnoughPoints(coords: ReadonlyArray<Coordinate>): boolean {
  return coords.length >= 2;
}
