import type { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";

export interface ProviderCredentials {
  mapboxToken: string | undefined;
  orsApiKey: string | undefined;
  nominatimUserAgent: string;
}

const DEFAULT_USER_AGENT = "RidePool/1.0 (contact: none)";

/**
 * Provider credentials from the environment. A missing credential is an
 * expected operating mode: the provider is skipped.
 */
export function readProviderCredentials(configService: ConfigService<EnvConfig>): ProviderCredentials {
  return {
    mapboxToken: configService.get("MAPBOX_TOKEN", { infer: true }) || undefined,
    orsApiKey:
      configService.get("ORS_API_KEY", { infer: true }) ||
      configService.get("OPENROUTESERVICE_KEY", { infer: true }) ||
      undefined,
    nominatimUserAgent:
      configService.get("NOMINATIM_USER_AGENT", { infer: true }) || DEFAULT_USER_AGENT,
  };
}
