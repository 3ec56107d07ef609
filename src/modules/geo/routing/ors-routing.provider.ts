import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../../config/env.config";
import { HttpClientService } from "../../http-client/http-client.service";
import { readProviderCredentials } from "../geo.config";
import {
  ORS_DIRECTIONS_URL,
  PROVIDER_SERVICE_NAMES,
  ROUTING_PROVIDERS,
  ROUTING_TIMEOUT_MS,
} from "../geo.const";
import type { Coordinate, RouteResult } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { hasEnoughPoints, toLonLatPairs, toRouteResult } from "./routing.helper";
import type { RoutingProvider } from "./routing.interface";
import { orsDirectionsResponseSchema } from "./routing.schema";

@Injectable()
export class OrsRoutingProvider
  extends HttpProviderAdapter<ReadonlyArray<Coordinate>, RouteResult, typeof ROUTING_PROVIDERS.ORS>
  implements RoutingProvider
{
  readonly name = ROUTING_PROVIDERS.ORS;
  private readonly configured: boolean;

  constructor(configService: ConfigService<EnvConfig>, httpClientService: HttpClientService) {
    const { orsApiKey } = readProviderCredentials(configService);

    super(httpClientService, {
      timeout: ROUTING_TIMEOUT_MS,
      headers: orsApiKey ? { Authorization: orsApiKey } : {},
      serviceName: PROVIDER_SERVICE_NAMES.ORS_DIRECTIONS,
    });
    this.configured = orsApiKey !== undefined;
    if (!this.configured) {
      this.logger.debug("ORS_API_KEY not set, skipping OpenRouteService routing");
    }
  }

  async attempt(coords: ReadonlyArray<Coordinate>): Promise<RouteResult | null> {
    if (!this.configured || !hasEnoughPoints(coords)) {
      return null;
    }

    const response = await this.fetchParsed(
      "route",
      (client) =>
        client.post<unknown>(
          ORS_DIRECTIONS_URL,
          { coordinates: toLonLatPairs(coords) },
          { headers: { "Content-Type": "application/json" } },
        ),
      orsDirectionsResponseSchema,
    );

    const feature = response?.features.at(0);
    return feature ? toRouteResult(feature.properties.summary) : null;
  }
}
