import { z } from "zod";
import { tripSchema } from "./trip.dto";

export const locateTripBodySchema = tripSchema.extend({
  regeocode: z.boolean().default(false),
});

export type LocateTripBodyDto = z.infer<typeof locateTripBodySchema>;
