import { Injectable, Logger } from "@nestjs/common";
import type { Coordinate, GeocodeResult, GeocodingProviderName } from "../geo.interface";
import { ProviderChain } from "../provider-chain";
import type { GeocodingProvider } from "./geocoding.interface";
import { MapboxGeocodingProvider } from "./mapbox-geocoding.provider";
import { NominatimGeocodingProvider } from "./nominatim-geocoding.provider";
import { OrsGeocodingProvider } from "./ors-geocoding.provider";

/**
 * Resolves free-text addresses to coordinates.
 *
 * Preference order is OpenRouteService (when keyed), then Mapbox (which itself
 * falls back to Nominatim without a token), then Nominatim explicitly. Each
 * attempt is one request; nothing is cached between calls.
 */
@Injectable()
export class GeocodingService {
  private readonly logger = new Logger(GeocodingService.name);
  private readonly chain: ProviderChain<string, Coordinate, GeocodingProviderName>;
  private readonly providers: Record<GeocodingProviderName, GeocodingProvider>;

  constructor(
    private readonly ors: OrsGeocodingProvider,
    private readonly mapbox: MapboxGeocodingProvider,
    private readonly nominatim: NominatimGeocodingProvider,
  ) {
    this.chain = new ProviderChain("geocoding", [ors, mapbox, nominatim]);
    this.providers = { ors, mapbox, nominatim };
  }

  /**
   * Geocode with one specific provider
   */
  async geocode(address: string | null | undefined, provider: GeocodingProviderName): Promise<Coordinate | null> {
    if (!address?.trim()) {
      return null;
    }
    return this.providers[provider].attempt(address);
  }

  /**
   * Geocode with the first provider that answers
   */
  async geocodeAny(address: string | null | undefined): Promise<GeocodeResult | null> {
    if (!address?.trim()) {
      return null;
    }

    const resolved = await this.chain.resolve(address);
    if (!resolved) {
      this.logger.warn(`Geocoding failed with ${this.chain.providerNames.join(", ")}`, { address });
      return null;
    }

    return { coordinate: resolved.result, provider: resolved.provider };
  }

  /**
   * Every configured provider's answer for the same address, used to compare
   * providers when a stored geocode looks wrong. Mapbox is skipped without a
   * token since it would only repeat Nominatim.
   */
  async geocodeCandidates(address: string | null | undefined): Promise<GeocodeResult[]> {
    if (!address?.trim()) {
      return [];
    }

    const candidates: GeocodeResult[] = [];
    const providers: GeocodingProvider[] = [this.ors, this.nominatim];
    if (this.mapbox.isConfigured()) {
      providers.splice(1, 0, this.mapbox);
    }

    for (const provider of providers) {
      const coordinate = await provider.attempt(address);
      if (coordinate) {
        candidates.push({ coordinate, provider: provider.name });
      }
    }

    return candidates;
  }
}
