import { Injectable, Logger } from "@nestjs/common";
import { GeocodingService } from "../geo/geocoding/geocoding.service";
import { isCoordinate } from "../geo/geo.helper";
import type { Coordinate } from "../geo/geo.interface";
import { EtaService } from "./eta.service";
import { STORED_COORDINATE_SOURCE } from "./trip-estimate.const";
import type {
  BackfillEntry,
  CandidatePair,
  CoordinateCandidate,
  EtaDiagnosis,
  Trip,
} from "./trip-estimate.interface";
import { hasLocationChanges, TripLocatorService } from "./trip-locator.service";

/**
 * Batch jobs over existing trips. Trips are processed one at a time and
 * nothing is persisted; callers decide what to write back.
 */
@Injectable()
export class EtaMaintenanceService {
  private readonly logger = new Logger(EtaMaintenanceService.name);

  constructor(
    private readonly geocodingService: GeocodingService,
    private readonly etaService: EtaService,
    private readonly tripLocatorService: TripLocatorService,
  ) {}

  /**
   * Geocode and route every trip missing coordinates or an ETA
   */
  async backfill(trips: ReadonlyArray<Trip>): Promise<BackfillEntry[]> {
    const entries: BackfillEntry[] = [];

    for (const [tripIndex, trip] of trips.entries()) {
      const update = await this.tripLocatorService.locate(trip);
      if (hasLocationChanges(update)) {
        entries.push({ tripIndex, update });
      }
    }

    this.logger.log(`Backfill updated ${entries.length} of ${trips.length} trips`);
    return entries;
  }

  /**
   * For trips whose stored ETA is above the threshold, geocode both addresses
   * with every provider and find the origin/destination pair with the shortest
   * plausible ETA.
   */
  async diagnose(
    trips: ReadonlyArray<Trip>,
    thresholdSeconds: number = this.etaService.flagThresholdSeconds,
  ): Promise<EtaDiagnosis[]> {
    const diagnoses: EtaDiagnosis[] = [];

    for (const [tripIndex, trip] of trips.entries()) {
      if (trip.etaSeconds == null || trip.etaSeconds <= thresholdSeconds) {
        continue;
      }

      const originCandidates = await this.gatherCandidates(trip.origin, trip.originCoordinate);
      const destinationCandidates = await this.gatherCandidates(trip.destination, trip.destinationCoordinate);
      const best = await this.pickBestPair(originCandidates, destinationCandidates);

      diagnoses.push({
        tripIndex,
        storedEtaSeconds: trip.etaSeconds,
        originCandidates,
        destinationCandidates,
        best,
        changed: best !== null && differsFromStored(best, trip),
      });
    }

    this.logger.log(`Diagnosed ${diagnoses.length} trips above ${thresholdSeconds}s`);
    return diagnoses;
  }

  private async gatherCandidates(
    address: string,
    stored: Coordinate | null | undefined,
  ): Promise<CoordinateCandidate[]> {
    const geocoded = await this.geocodingService.geocodeCandidates(address);
    const candidates: CoordinateCandidate[] = geocoded.map(({ coordinate, provider }) => ({
      coordinate,
      source: provider,
    }));

    if (isCoordinate(stored)) {
      candidates.push({ coordinate: stored, source: STORED_COORDINATE_SOURCE });
    }

    return candidates;
  }

  private async pickBestPair(
    origins: CoordinateCandidate[],
    destinations: CoordinateCandidate[],
  ): Promise<CandidatePair | null> {
    let best: CandidatePair | null = null;

    for (const origin of origins) {
      for (const destination of destinations) {
        const eta = await this.etaService.computeEta(origin.coordinate, destination.coordinate);
        if (eta && (best === null || eta.seconds < best.etaSeconds)) {
          best = { origin, destination, etaSeconds: eta.seconds, etaSource: eta.source };
        }
      }
    }

    return best;
  }
}

function sameCoordinate(a: Coordinate, b: Coordinate | null | undefined): boolean {
  return b != null && a.latitude === b.latitude && a.longitude === b.longitude;
}

function differsFromStored(best: CandidatePair, trip: Trip): boolean {
  return (
    !sameCoordinate(best.origin.coordinate, trip.originCoordinate) ||
    !sameCoordinate(best.destination.coordinate, trip.destinationCoordinate) ||
    best.etaSeconds !== trip.etaSeconds
  );
}
