import type {
  Coordinate,
  GeocodingProviderName,
  RoutingProviderName,
} from "../geo/geo.interface";
import type {
  ETA_FLAG_REASONS,
  ETA_SOURCES,
  ETA_UNRESOLVED_STATE,
  STORED_COORDINATE_SOURCE,
} from "./trip-estimate.const";

/**
 * The trip record handed in by callers. Everything past the two addresses may
 * be missing on trips that were never geocoded or routed.
 */
export interface Trip {
  origin: string;
  destination: string;
  originCoordinate?: Coordinate | null;
  destinationCoordinate?: Coordinate | null;
  etaSeconds?: number | null;
  etaUpdatedAt?: Date | null;
  seats?: number;
  departTime?: Date | null;
}

export type EtaSource = (typeof ETA_SOURCES)[keyof typeof ETA_SOURCES];
export type EtaState = EtaSource | typeof ETA_UNRESOLVED_STATE;
export type EtaFlagReason = (typeof ETA_FLAG_REASONS)[keyof typeof ETA_FLAG_REASONS];

export interface EtaComputation {
  seconds: number;
  source: EtaSource;
  /** Road distance of the accepted route; null when the estimate was used */
  routeDistanceMeters: number | null;
  routeProvider: RoutingProviderName | null;
  /** A route with a duration came back but failed the plausibility check */
  routeRejected: boolean;
}

export interface AdjustedEta {
  seconds: number;
  human: string;
  arrival: Date | null;
}

export interface TripCostEstimate {
  miles: number;
  totalCost: number;
  perSeatCost: number;
}

/**
 * Read-only view of a trip's ETA. Returned beside the trip and never merged
 * into it; `adjusted` is for display only.
 */
export interface ResolvedEta {
  readonly state: EtaState;
  readonly etaSeconds: number | null;
  readonly etaHuman: string | null;
  readonly etaArrival: Date | null;
  readonly flagged: boolean;
  readonly flagReasons: readonly EtaFlagReason[];
  readonly adjusted: AdjustedEta | null;
  readonly greatCircleMiles: number | null;
  readonly routeDistanceMeters: number | null;
  readonly routeProvider: RoutingProviderName | null;
  readonly cost: TripCostEstimate | null;
  readonly directionsUrl: string;
}

export interface DetourEstimate {
  addedSeconds: number | null;
  addedHuman: string | null;
}

export interface LocateOptions {
  /** Geocode both ends again and recompute the ETA, as after an edit */
  regeocode?: boolean;
}

/**
 * Only the fields `TripLocatorService.locate` changed. Callers persist it
 * if they want to.
 */
export interface TripLocationUpdate {
  originCoordinate?: Coordinate;
  originProvider?: GeocodingProviderName;
  destinationCoordinate?: Coordinate;
  destinationProvider?: GeocodingProviderName;
  etaSeconds?: number;
  etaSource?: EtaSource;
  etaUpdatedAt?: Date;
}

export interface BackfillEntry {
  tripIndex: number;
  update: TripLocationUpdate;
}

export type CoordinateSource = GeocodingProviderName | typeof STORED_COORDINATE_SOURCE;

export interface CoordinateCandidate {
  coordinate: Coordinate;
  source: CoordinateSource;
}

export interface CandidatePair {
  origin: CoordinateCandidate;
  destination: CoordinateCandidate;
  etaSeconds: number;
  etaSource: EtaSource;
}

export interface EtaDiagnosis {
  tripIndex: number;
  storedEtaSeconds: number;
  originCandidates: CoordinateCandidate[];
  destinationCandidates: CoordinateCandidate[];
  best: CandidatePair | null;
  /** The best pair moves a coordinate or changes the stored ETA */
  changed: boolean;
}
