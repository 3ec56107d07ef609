import { z } from "zod";

export const geocodeQuerySchema = z.object({
  address: z.string().trim().min(1, "Address is required"),
});

export type GeocodeQueryDto = z.infer<typeof geocodeQuerySchema>;
