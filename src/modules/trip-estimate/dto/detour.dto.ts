import { z } from "zod";
import { coordinateSchema, tripSchema } from "./trip.dto";

export const detourBodySchema = z.object({
  trip: tripSchema,
  pickup: coordinateSchema,
});

export type DetourBodyDto = z.infer<typeof detourBodySchema>;
