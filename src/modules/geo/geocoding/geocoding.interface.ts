import type { Coordinate, GeocodingProviderName } from "../geo.interface";
import type { ProviderAdapter } from "../provider-chain";

/**
 * A geocoding service adapter: free-text address in, coordinate (or null) out
 */
export type GeocodingProvider = ProviderAdapter<string, Coordinate, GeocodingProviderName>;
