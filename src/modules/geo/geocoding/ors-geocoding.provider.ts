import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../../config/env.config";
import { HttpClientService } from "../../http-client/http-client.service";
import { readProviderCredentials } from "../geo.config";
import {
  GEOCODING_PROVIDERS,
  ORS_GEOCODING_TIMEOUT_MS,
  ORS_GEOCODING_URL,
  PROVIDER_SERVICE_NAMES,
} from "../geo.const";
import { toCoordinate } from "../geo.helper";
import type { Coordinate } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { orsGeocodingResponseSchema } from "./geocoding.schema";
import type { GeocodingProvider } from "./geocoding.interface";

/**
 * OpenRouteService geocode/search. Skipped without an ORS key.
 */
@Injectable()
export class OrsGeocodingProvider
  extends HttpProviderAdapter<string, Coordinate, typeof GEOCODING_PROVIDERS.ORS>
  implements GeocodingProvider
{
  readonly name = GEOCODING_PROVIDERS.ORS;
  private readonly apiKey: string | undefined;

  constructor(configService: ConfigService<EnvConfig>, httpClientService: HttpClientService) {
    const credentials = readProviderCredentials(configService);

    super(httpClientService, {
      timeout: ORS_GEOCODING_TIMEOUT_MS,
      headers: { "User-Agent": credentials.nominatimUserAgent },
      serviceName: PROVIDER_SERVICE_NAMES.ORS_GEOCODING,
    });
    this.apiKey = credentials.orsApiKey;
    if (!this.apiKey) {
      this.logger.debug("ORS_API_KEY not set, skipping OpenRouteService geocoding");
    }
  }

  isConfigured(): boolean {
    return this.apiKey !== undefined;
  }

  async attempt(address: string): Promise<Coordinate | null> {
    const text = address.trim();
    if (!text || !this.apiKey) {
      return null;
    }

    const apiKey = this.apiKey;
    const response = await this.fetchParsed(
      "geocode",
      (client) =>
        client.get<unknown>(ORS_GEOCODING_URL, {
          params: { api_key: apiKey, text, size: 1 },
        }),
      orsGeocodingResponseSchema,
    );

    const feature = response?.features.at(0);
    if (!feature) {
      return null;
    }

    const [longitude, latitude] = feature.geometry.coordinates;
    return toCoordinate(latitude, longitude);
  }
}
