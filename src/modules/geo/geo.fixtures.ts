import { ConfigService } from "@nestjs/config";
import { Test, type TestingModule } from "@nestjs/testing";
import { vi } from "vitest";
import {
  createMockAxiosInstance,
  createMockHttpClientServiceByName,
  type MockAxiosInstance,
} from "../http-client/http-client.fixtures";
import { HttpClientService } from "../http-client/http-client.service";
import { PROVIDER_SERVICE_NAMES } from "./geo.const";
import { GeocodingService } from "./geocoding/geocoding.service";
import { MapboxGeocodingProvider } from "./geocoding/mapbox-geocoding.provider";
import { NominatimGeocodingProvider } from "./geocoding/nominatim-geocoding.provider";
import { OrsGeocodingProvider } from "./geocoding/ors-geocoding.provider";
import { MapboxRoutingProvider } from "./routing/mapbox-routing.provider";
import { OrsRoutingProvider } from "./routing/ors-routing.provider";
import { OsrmRoutingProvider } from "./routing/osrm-routing.provider";
import { RoutingService } from "./routing/routing.service";

export const TEST_MAPBOX_TOKEN = "test-mapbox-token";
export const TEST_ORS_KEY = "test-ors-key";

export type ProviderClients = Record<keyof typeof PROVIDER_SERVICE_NAMES, MockAxiosInstance>;

export function createProviderClients(): ProviderClients {
  return {
    ORS_GEOCODING: createMockAxiosInstance(),
    MAPBOX_GEOCODING: createMockAxiosInstance(),
    NOMINATIM_GEOCODING: createMockAxiosInstance(),
    MAPBOX_DIRECTIONS: createMockAxiosInstance(),
    ORS_DIRECTIONS: createMockAxiosInstance(),
    OSRM_DIRECTIONS: createMockAxiosInstance(),
  };
}

/**
 * Testing module holding every geo provider with mocked config and a separate
 * mock axios instance per provider
 */
export async function createGeoTestingModule(
  env: Record<string, string | undefined>,
  clients: ProviderClients = createProviderClients(),
): Promise<TestingModule> {
  const configService = { get: vi.fn((key: string) => env[key]) };
  const byServiceName: Record<string, MockAxiosInstance> = {
    [PROVIDER_SERVICE_NAMES.ORS_GEOCODING]: clients.ORS_GEOCODING,
    [PROVIDER_SERVICE_NAMES.MAPBOX_GEOCODING]: clients.MAPBOX_GEOCODING,
    [PROVIDER_SERVICE_NAMES.NOMINATIM_GEOCODING]: clients.NOMINATIM_GEOCODING,
    [PROVIDER_SERVICE_NAMES.MAPBOX_DIRECTIONS]: clients.MAPBOX_DIRECTIONS,
    [PROVIDER_SERVICE_NAMES.ORS_DIRECTIONS]: clients.ORS_DIRECTIONS,
    [PROVIDER_SERVICE_NAMES.OSRM_DIRECTIONS]: clients.OSRM_DIRECTIONS,
  };

  return Test.createTestingModule({
    providers: [
      OrsGeocodingProvider,
      MapboxGeocodingProvider,
      NominatimGeocodingProvider,
      GeocodingService,
      MapboxRoutingProvider,
      OrsRoutingProvider,
      OsrmRoutingProvider,
      RoutingService,
      { provide: ConfigService, useValue: configService },
      { provide: HttpClientService, useValue: createMockHttpClientServiceByName(byServiceName) },
    ],
  }).compile();
}
