import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../../config/env.config";
import { HttpClientService } from "../../http-client/http-client.service";
import { readProviderCredentials } from "../geo.config";
import {
  MAPBOX_DIRECTIONS_URL,
  PROVIDER_SERVICE_NAMES,
  ROUTING_PROVIDERS,
  ROUTING_TIMEOUT_MS,
} from "../geo.const";
import type { Coordinate, RouteResult } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { hasEnoughPoints, toCoordinatePath, toRouteResult } from "./routing.helper";
import type { RoutingProvider } from "./routing.interface";
import { directionsRoutesResponseSchema } from "./routing.schema";

@Injectable()
export class MapboxRoutingProvider
  extends HttpProviderAdapter<ReadonlyArray<Coordinate>, RouteResult, typeof ROUTING_PROVIDERS.MAPBOX>
  implements RoutingProvider
{
  readonly name = ROUTING_PROVIDERS.MAPBOX;
  private readonly token: string | undefined;

  constructor(configService: ConfigService<EnvConfig>, httpClientService: HttpClientService) {
    super(httpClientService, {
      timeout: ROUTING_TIMEOUT_MS,
      serviceName: PROVIDER_SERVICE_NAMES.MAPBOX_DIRECTIONS,
    });
    this.token = readProviderCredentials(configService).mapboxToken;
    if (!this.token) {
      this.logger.debug("MAPBOX_TOKEN not set, skipping Mapbox routing");
    }
  }

  async attempt(coords: ReadonlyArray<Coordinate>): Promise<RouteResult | null> {
    if (!this.token || !hasEnoughPoints(coords)) {
      return null;
    }

    const accessToken = this.token;
    const response = await this.fetchParsed(
      "route",
      (client) =>
        client.get<unknown>(`${MAPBOX_DIRECTIONS_URL}/${toCoordinatePath(coords)}`, {
          params: {
            access_token: accessToken,
            overview: "simplified",
            geometries: "geojson",
            steps: "false",
          },
        }),
      directionsRoutesResponseSchema,
    );

    const route = response?.routes.at(0);
    return route ? toRouteResult(route) : null;
  }
}
