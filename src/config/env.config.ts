import { z } from "zod";

const optionalCredential = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

export const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default("0.0.0.0"),

  MAPBOX_TOKEN: optionalCredential,
  ORS_API_KEY: optionalCredential,
  OPENROUTESERVICE_KEY: optionalCredential,
  NOMINATIM_USER_AGENT: z.string().min(1).default("RidePool/1.0 (contact: none)"),

  ETA_FLAG_THRESHOLD_SECONDS: z.coerce.number().int().positive().default(21_600),
  ETA_ADJUST_MIN_SECONDS: z.coerce.number().int().positive().default(14_400),
  ETA_ADJUST_RATIO: z.coerce.number().positive().default(5),
  ETA_ADJUST_MAX_MILES: z.coerce.number().positive().default(10),
  ETA_ADJUST_FACTOR: z.coerce.number().positive().default(1.2),

  TRIP_COST_MPG: z.coerce.number().positive().default(25),
  TRIP_COST_PRICE_PER_GALLON: z.coerce.number().nonnegative().default(3.5),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = z.flattenError(result.error).fieldErrors;
    console.error("❌ Environment validation failed:");

    for (const [field, messages] of Object.entries(errors)) {
      console.error(`  ${field}: ${messages?.join(", ")}`);
    }

    throw new Error("Invalid environment configuration. Please check your .env file.");
  }

  return result.data;
}
