import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../../config/env.config";
import { HttpClientService } from "../../http-client/http-client.service";
import { readProviderCredentials } from "../geo.config";
import {
  GEOCODING_PROVIDERS,
  GEOCODING_TIMEOUT_MS,
  MAPBOX_GEOCODING_URL,
  PROVIDER_SERVICE_NAMES,
} from "../geo.const";
import { toCoordinate } from "../geo.helper";
import type { Coordinate, GeocodingProviderName } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { mapboxGeocodingResponseSchema } from "./geocoding.schema";
import type { GeocodingProvider } from "./geocoding.interface";
import { NominatimGeocodingProvider } from "./nominatim-geocoding.provider";

/**
 * Mapbox Places geocoding. Without a token it hands the address to Nominatim
 * and reports itself under Nominatim's name.
 */
@Injectable()
export class MapboxGeocodingProvider
  extends HttpProviderAdapter<string, Coordinate, GeocodingProviderName>
  implements GeocodingProvider
{
  private readonly token: string | undefined;

  constructor(
    configService: ConfigService<EnvConfig>,
    httpClientService: HttpClientService,
    private readonly nominatim: NominatimGeocodingProvider,
  ) {
    super(httpClientService, {
      timeout: GEOCODING_TIMEOUT_MS,
      serviceName: PROVIDER_SERVICE_NAMES.MAPBOX_GEOCODING,
    });
    this.token = readProviderCredentials(configService).mapboxToken;
    if (!this.token) {
      this.logger.debug("MAPBOX_TOKEN not set, geocoding through Nominatim");
    }
  }

  get name(): GeocodingProviderName {
    return this.token ? GEOCODING_PROVIDERS.MAPBOX : this.nominatim.name;
  }

  isConfigured(): boolean {
    return this.token !== undefined;
  }

  async attempt(address: string): Promise<Coordinate | null> {
    const query = address.trim();
    if (!query) {
      return null;
    }

    if (!this.token) {
      return this.nominatim.attempt(query);
    }

    const accessToken = this.token;
    const response = await this.fetchParsed(
      "geocode",
      (client) =>
        client.get<unknown>(`${MAPBOX_GEOCODING_URL}/${encodeURIComponent(query)}.json`, {
          params: { access_token: accessToken, limit: 1 },
        }),
      mapboxGeocodingResponseSchema,
    );

    const feature = response?.features.at(0);
    if (!feature) {
      return null;
    }

    const [longitude, latitude] = feature.center;
    return toCoordinate(latitude, longitude);
  }
}
