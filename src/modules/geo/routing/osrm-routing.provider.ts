import { Injectable } from "@nestjs/common";
import { HttpClientService } from "../../http-client/http-client.service";
import {
  OSRM_ROUTE_URL,
  PROVIDER_SERVICE_NAMES,
  ROUTING_PROVIDERS,
  ROUTING_TIMEOUT_MS,
} from "../geo.const";
import type { Coordinate, RouteResult } from "../geo.interface";
import { HttpProviderAdapter } from "../http-provider.adapter";
import { hasEnoughPoints, toCoordinatePath, toRouteResult } from "./routing.helper";
import type { RoutingProvider } from "./routing.interface";
import { directionsRoutesResponseSchema } from "./routing.schema";

/**
 * OSRM public demo server. Needs no credential; meant for light use, so it is
 * always tried after the keyed providers.
 */
@Injectable()
export class OsrmRoutingProvider
  extends HttpProviderAdapter<ReadonlyArray<Coordinate>, RouteResult, typeof ROUTING_PROVIDERS.OSRM>
  implements RoutingProvider
{
  readonly name = ROUTING_PROVIDERS.OSRM;

  constructor(httpClientService: HttpClientService) {
    super(httpClientService, {
      timeout: ROUTING_TIMEOUT_MS,
      serviceName: PROVIDER_SERVICE_NAMES.OSRM_DIRECTIONS,
    });
  }

  async attempt(coords: ReadonlyArray<Coordinate>): Promise<RouteResult | null> {
    if (!hasEnoughPoints(coords)) {
      return null;
    }

    const response = await this.fetchParsed(
      "route",
      (client) =>
        client.get<unknown>(`${OSRM_ROUTE_URL}/${toCoordinatePath(coords)}`, {
          params: { overview: "false", steps: "false" },
        }),
      directionsRoutesResponseSchema,
    );

    const route = response?.routes.at(0);
    return route ? toRouteResult(route) : null;
  }
}
