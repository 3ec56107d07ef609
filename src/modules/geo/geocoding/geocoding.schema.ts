import { z } from "zod";

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

export const mapboxGeocodingResponseSchema = z.object({
  features: z.array(
    z.object({
      // [longitude, latitude]
      center: z.tuple([z.number(), z.number()]),
    }),
  ),
});

export const orsGeocodingResponseSchema = z.object({
  features: z.array(
    z.object({
      geometry: z.object({
        // [longitude, latitude, ...]
        coordinates: z.array(z.number()).min(2),
      }),
    }),
  ),
});

export const nominatimSearchResponseSchema = z.array(
  z.object({
    lat: numeric,
    lon: numeric,
  }),
);
