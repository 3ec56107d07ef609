/**
 * Persisted or computed ETAs above this are flagged for review
 */
export const DEFAULT_ETA_FLAG_THRESHOLD_SECONDS = 6 * 60 * 60;

/**
 * Display adjustment: a long ETA for a short great-circle hop usually means one
 * end was geocoded to the wrong place. All four conditions must hold.
 */
export const DEFAULT_ETA_ADJUST_MIN_SECONDS = 4 * 60 * 60;
export const DEFAULT_ETA_ADJUST_RATIO = 5;
export const DEFAULT_ETA_ADJUST_MAX_MILES = 10;
export const DEFAULT_ETA_ADJUST_FACTOR = 1.2;
export const MIN_ADJUSTED_ETA_SECONDS = 60;

export const DEFAULT_TRIP_COST_MPG = 25;
export const DEFAULT_TRIP_COST_PRICE_PER_GALLON = 3.5;

export const ETA_SOURCES = {
  PERSISTED: "persisted",
  ROUTED: "routed",
  ESTIMATED: "estimated",
} as const;

export const ETA_UNRESOLVED_STATE = "unresolved";

export const ETA_FLAG_REASONS = {
  LONG_ETA: "long-eta",
  IMPLAUSIBLE_ROUTE: "implausible-route",
  DISPLAY_ADJUSTED: "display-adjusted",
} as const;

export const STORED_COORDINATE_SOURCE = "stored";
