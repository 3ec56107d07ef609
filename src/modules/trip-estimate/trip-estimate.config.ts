import type { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";
import {
  DEFAULT_ETA_ADJUST_FACTOR,
  DEFAULT_ETA_ADJUST_MAX_MILES,
  DEFAULT_ETA_ADJUST_MIN_SECONDS,
  DEFAULT_ETA_ADJUST_RATIO,
  DEFAULT_ETA_FLAG_THRESHOLD_SECONDS,
  DEFAULT_TRIP_COST_MPG,
  DEFAULT_TRIP_COST_PRICE_PER_GALLON,
} from "./trip-estimate.const";

export interface EtaSettings {
  flagThresholdSeconds: number;
  adjustMinSeconds: number;
  adjustRatio: number;
  adjustMaxMiles: number;
  adjustFactor: number;
  costMpg: number;
  costPricePerGallon: number;
}

export function readEtaSettings(configService: ConfigService<EnvConfig>): EtaSettings {
  return {
    flagThresholdSeconds:
      configService.get("ETA_FLAG_THRESHOLD_SECONDS", { infer: true }) ?? DEFAULT_ETA_FLAG_THRESHOLD_SECONDS,
    adjustMinSeconds: configService.get("ETA_ADJUST_MIN_SECONDS", { infer: true }) ?? DEFAULT_ETA_ADJUST_MIN_SECONDS,
    adjustRatio: configService.get("ETA_ADJUST_RATIO", { infer: true }) ?? DEFAULT_ETA_ADJUST_RATIO,
    adjustMaxMiles: configService.get("ETA_ADJUST_MAX_MILES", { infer: true }) ?? DEFAULT_ETA_ADJUST_MAX_MILES,
    adjustFactor: configService.get("ETA_ADJUST_FACTOR", { infer: true }) ?? DEFAULT_ETA_ADJUST_FACTOR,
    costMpg: configService.get("TRIP_COST_MPG", { infer: true }) ?? DEFAULT_TRIP_COST_MPG,
    costPricePerGallon:
      configService.get("TRIP_COST_PRICE_PER_GALLON", { infer: true }) ?? DEFAULT_TRIP_COST_PRICE_PER_GALLON,
  };
}
