export const EARTH_RADIUS_MILES = 3958.8;
export const METERS_PER_MILE = 1609.344;
export const MPH_TO_METERS_PER_SECOND = 0.44704;

/**
 * Average speed assumed when turning a straight-line distance into a duration
 */
export const DEFAULT_AVG_SPEED_MPH = 35;

/**
 * Route plausibility bounds
 */
export const MAX_ROUTE_DURATION_SECONDS = 24 * 60 * 60;
export const MAX_ROUTE_DISTANCE_RATIO = 10;
export const MAX_ROUTE_DURATION_RATIO = 5;

export const GEOCODING_TIMEOUT_MS = 5_000;
export const ORS_GEOCODING_TIMEOUT_MS = 6_000;
export const ROUTING_TIMEOUT_MS = 10_000;

export const GEOCODING_PROVIDERS = {
  ORS: "ors",
  MAPBOX: "mapbox",
  NOMINATIM: "nominatim",
} as const;

export const ROUTING_PROVIDERS = {
  MAPBOX: "mapbox",
  ORS: "ors",
  OSRM: "osrm",
} as const;

/**
 * `serviceName` each provider registers its HTTP client under (shows up in logs)
 */
export const PROVIDER_SERVICE_NAMES = {
  ORS_GEOCODING: "OpenRouteService Geocoding",
  MAPBOX_GEOCODING: "Mapbox Geocoding",
  NOMINATIM_GEOCODING: "Nominatim Geocoding",
  MAPBOX_DIRECTIONS: "Mapbox Directions",
  ORS_DIRECTIONS: "OpenRouteService Directions",
  OSRM_DIRECTIONS: "OSRM Directions",
} as const;

export const MAPBOX_GEOCODING_URL = "https://api.mapbox.com/geocoding/v5/mapbox.places";
export const ORS_GEOCODING_URL = "https://api.openrouteservice.org/geocode/search";
export const NOMINATIM_SEARCH_URL = "https://nominatim.openstreetmap.org/search";
export const MAPBOX_DIRECTIONS_URL = "https://api.mapbox.com/directions/v5/mapbox/driving";
export const ORS_DIRECTIONS_URL = "https://api.openrouteservice.org/v2/directions/driving-car/geojson";
export const OSRM_ROUTE_URL = "https://router.project-osrm.org/route/v1/driving";

export const GOOGLE_MAPS_DIRECTIONS_URL = "https://www.google.com/maps/dir/";
