import { addSeconds } from "date-fns";
import { METERS_PER_MILE } from "../geo/geo.const";
import { formatDuration } from "../geo/geo.helper";
import type { EtaSettings } from "./trip-estimate.config";
import { MIN_ADJUSTED_ETA_SECONDS } from "./trip-estimate.const";
import type { AdjustedEta, TripCostEstimate } from "./trip-estimate.interface";

const roundCents = (value: number) => Math.round(value * 100) / 100;

/**
 * Fuel cost of driving `routeDistanceMeters`, split across the listed seats.
 *
 * @example
 * estimateTripCost(160934.4, 4, { costMpg: 25, costPricePerGallon: 3.5 })
 * // { miles: 100, totalCost: 14, perSeatCost: 3.5 }
 */
export function estimateTripCost(
  routeDistanceMeters: number,
  seats: number | null | undefined,
  settings: Pick<EtaSettings, "costMpg" | "costPricePerGallon">,
): TripCostEstimate {
  const miles = routeDistanceMeters / METERS_PER_MILE;
  const total = (miles / settings.costMpg) * settings.costPricePerGallon;
  const divisor = Math.max(1, seats ?? 1);

  return {
    miles: roundCents(miles),
    totalCost: roundCents(total),
    perSeatCost: roundCents(total / divisor),
  };
}

export function arrivalAfter(departTime: Date | null | undefined, seconds: number): Date | null {
  return departTime ? addSeconds(departTime, seconds) : null;
}

/**
 * Display-only ETA for a long ETA over a short great-circle hop, or null when
 * the ETA does not look inflated.
 */
export function adjustInflatedEta(
  etaSeconds: number,
  greatCircleMiles: number | null,
  greatCircleEstimateSeconds: number | null,
  departTime: Date | null | undefined,
  settings: Pick<EtaSettings, "adjustMinSeconds" | "adjustRatio" | "adjustMaxMiles" | "adjustFactor">,
): AdjustedEta | null {
  if (greatCircleMiles === null || greatCircleEstimateSeconds === null) {
    return null;
  }

  const inflated =
    etaSeconds > settings.adjustMinSeconds &&
    etaSeconds > settings.adjustRatio * greatCircleEstimateSeconds &&
    greatCircleMiles < settings.adjustMaxMiles;

  if (!inflated) {
    return null;
  }

  const seconds = Math.max(
    MIN_ADJUSTED_ETA_SECONDS,
    Math.round(greatCircleEstimateSeconds * settings.adjustFactor),
  );

  return {
    seconds,
    human: formatDuration(seconds),
    arrival: arrivalAfter(departTime, seconds),
  };
}
