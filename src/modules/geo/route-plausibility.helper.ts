import {
  DEFAULT_AVG_SPEED_MPH,
  MAX_ROUTE_DISTANCE_RATIO,
  MAX_ROUTE_DURATION_RATIO,
  MAX_ROUTE_DURATION_SECONDS,
} from "./geo.const";
import { durationSecondsFromMeters, metersBetween } from "./geo.helper";
import type { Coordinate, RouteResult } from "./geo.interface";

export interface PlausibilityOptions {
  maxDurationSeconds?: number;
  maxDistanceRatio?: number;
}

/**
 * Heuristic filter against geocoding ambiguity producing absurd routes (a short
 * hop geocoded onto the wrong continent). Compares the route with the
 * great-circle baseline between the same endpoints.
 *
 * The absolute duration cap applies whenever a duration is present; beyond
 * that, a route missing either metric cannot be judged and passes.
 */
export function isRouteReasonable(
  route: RouteResult | null | undefined,
  from: Coordinate | null | undefined,
  to: Coordinate | null | undefined,
  {
    maxDurationSeconds = MAX_ROUTE_DURATION_SECONDS,
    maxDistanceRatio = MAX_ROUTE_DISTANCE_RATIO,
  }: PlausibilityOptions = {},
): boolean {
  if (!route) {
    return false;
  }

  const { durationSeconds, distanceMeters } = route;
  if (durationSeconds !== null && durationSeconds > maxDurationSeconds) {
    return false;
  }

  if (durationSeconds === null || distanceMeters === null) {
    return true;
  }

  const straightLineMeters = metersBetween(from, to);
  if (straightLineMeters === null || straightLineMeters <= 0) {
    return true;
  }

  if (distanceMeters / straightLineMeters > maxDistanceRatio) {
    return false;
  }

  const estimate = durationSecondsFromMeters(straightLineMeters, DEFAULT_AVG_SPEED_MPH);
  if (estimate !== null && estimate > 0 && durationSeconds / estimate > MAX_ROUTE_DURATION_RATIO) {
    return false;
  }

  return true;
}
