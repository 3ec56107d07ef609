import {
  DEFAULT_AVG_SPEED_MPH,
  EARTH_RADIUS_MILES,
  GOOGLE_MAPS_DIRECTIONS_URL,
  METERS_PER_MILE,
  MPH_TO_METERS_PER_SECOND,
} from "./geo.const";
import type { Coordinate, DirectionsLinkInput } from "./geo.interface";

type MaybeNumber = number | null | undefined;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Great-circle (haversine) distance in miles, or null when any input is missing
 */
export function distanceMiles(
  lat1: MaybeNumber,
  lon1: MaybeNumber,
  lat2: MaybeNumber,
  lon2: MaybeNumber,
): number | null {
  if (lat1 == null || lon1 == null || lat2 == null || lon2 == null) {
    return null;
  }

  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_MILES * 2 * Math.asin(Math.sqrt(a));
}

export function distanceMilesBetween(
  from: Coordinate | null | undefined,
  to: Coordinate | null | undefined,
): number | null {
  return distanceMiles(from?.latitude, from?.longitude, to?.latitude, to?.longitude);
}

export function metersBetween(
  from: Coordinate | null | undefined,
  to: Coordinate | null | undefined,
): number | null {
  const miles = distanceMilesBetween(from, to);
  return miles === null ? null : miles * METERS_PER_MILE;
}

/**
 * Time in whole seconds to cover `distanceMeters` at `avgSpeedMph`
 */
export function durationSecondsFromMeters(
  distanceMeters: MaybeNumber,
  avgSpeedMph: number = DEFAULT_AVG_SPEED_MPH,
): number | null {
  if (distanceMeters == null) {
    return null;
  }

  const metersPerSecond = avgSpeedMph * MPH_TO_METERS_PER_SECOND;
  if (!(metersPerSecond > 0)) {
    return null;
  }

  return Math.round(distanceMeters / metersPerSecond);
}

/**
 * Straight-line duration estimate between two points at the default speed
 */
export function estimateSecondsBetween(
  from: Coordinate | null | undefined,
  to: Coordinate | null | undefined,
): number | null {
  return durationSecondsFromMeters(metersBetween(from, to));
}

/**
 * "1h 5m", "20m", or "<1m"
 */
export function formatDuration(seconds: number): string {
  const totalMinutes = Math.floor(seconds / 60);
  if (totalMinutes < 1) {
    return "<1m";
  }

  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/**
 * Google Maps driving-directions link. Address text wins over coordinates for each end.
 */
export function buildDirectionsUrl(input: DirectionsLinkInput): string {
  const params = new URLSearchParams({ api: "1" });

  const origin = input.origin || formatLatLng(input.originCoordinate);
  if (origin) {
    params.append("origin", origin);
  }

  const destination = input.destination || formatLatLng(input.destinationCoordinate);
  if (destination) {
    params.append("destination", destination);
  }

  params.append("travelmode", "driving");

  return `${GOOGLE_MAPS_DIRECTIONS_URL}?${params.toString()}`;
}

function formatLatLng(coordinate: Coordinate | null | undefined): string | undefined {
  return coordinate ? `${coordinate.latitude},${coordinate.longitude}` : undefined;
}

/**
 * Coordinate from provider output, or null when outside the valid lat/lng range
 */
export function toCoordinate(latitude: number, longitude: number): Coordinate | null {
  if (
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    return null;
  }
  return { latitude, longitude };
}

export function isCoordinate(value: Partial<Coordinate> | null | undefined): value is Coordinate {
  return (
    value != null &&
    typeof value.latitude === "number" &&
    typeof value.longitude === "number" &&
    Number.isFinite(value.latitude) &&
    Number.isFinite(value.longitude)
  );
}
