import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../../config/env.config";
import { HttpClientService } from "../../http-client/http-client.service";
import { readProviderCredentials } from "../geo.config";
import {
  GEOCODING_PROVIDERS,
  GEOCODING_TIMEOUT_MS,
  NOMINATIM_SEARCH_URL,
  PROVIDER_SERVICE_NAMES,
} from "../geo.const";
import { toCoordinate } from "../geo.helper";
import type { Coordinate } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { nominatimSearchResponseSchema } from "./geocoding.schema";
import type { GeocodingProvider } from "./geocoding.interface";

/**
 * OpenStreetMap Nominatim search. Needs no credential but the public instance
 * requires an identifying User-Agent and light usage.
 */
@Injectable()
export class NominatimGeocodingProvider
  extends HttpProviderAdapter<string, Coordinate, typeof GEOCODING_PROVIDERS.NOMINATIM>
  implements GeocodingProvider
{
  readonly name = GEOCODING_PROVIDERS.NOMINATIM;

  constructor(configService: ConfigService<EnvConfig>, httpClientService: HttpClientService) {
    super(httpClientService, {
      timeout: GEOCODING_TIMEOUT_MS,
      headers: { "User-Agent": readProviderCredentials(configService).nominatimUserAgent },
      serviceName: PROVIDER_SERVICE_NAMES.NOMINATIM_GEOCODING,
    });
  }

  async attempt(address: string): Promise<Coordinate | null> {
    const query = address.trim();
    if (!query) {
      return null;
    }

    const places = await this.fetchParsed(
      "geocode",
      (client) =>
        client.get<unknown>(NOMINATIM_SEARCH_URL, {
          params: { q: query, format: "json", limit: 1 },
        }),
      nominatimSearchResponseSchema,
    );

    const place = places?.at(0);
    return place ? toCoordinate(place.lat, place.lon) : null;
  }
}
