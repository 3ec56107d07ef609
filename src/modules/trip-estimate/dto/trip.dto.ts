import { z } from "zod";

export const coordinateSchema = z.object({
  latitude: z.number().min(-90, "Latitude must be between -90 and 90").max(90, "Latitude must be between -90 and 90"),
  longitude: z
    .number()
    .min(-180, "Longitude must be between -180 and 180")
    .max(180, "Longitude must be between -180 and 180"),
});

/**
 * Trip record as sent by callers (HTTP body or a CLI trips file). Dates arrive
 * as ISO strings.
 */
export const tripSchema = z.object({
  origin: z.string().trim().min(1, "Origin address is required"),
  destination: z.string().trim().min(1, "Destination address is required"),
  originCoordinate: coordinateSchema.nullish(),
  destinationCoordinate: coordinateSchema.nullish(),
  etaSeconds: z.number().int().nonnegative().nullish(),
  etaUpdatedAt: z.coerce.date("Invalid ETA timestamp").nullish(),
  seats: z.number().int().positive("Seats must be at least 1").default(1),
  departTime: z.coerce.date("Invalid departure time").nullish(),
});

export type TripDto = z.infer<typeof tripSchema>;

export const tripListSchema = z.array(tripSchema);
