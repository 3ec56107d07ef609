import { z } from "zod";

const metric = z.number().nullish();

/**
 * Mapbox Directions and OSRM share the same route shape
 */
export const directionsRoutesResponseSchema = z.object({
  routes: z.array(
    z.object({
      distance: metric,
      duration: metric,
    }),
  ),
});

/**
 * OpenRouteService GeoJSON directions: metrics sit in features[].properties.summary
 */
export const orsDirectionsResponseSchema = z.object({
  features: z.array(
    z.object({
      properties: z.object({
        summary: z.object({
          distance: metric,
          duration: metric,
        }),
      }),
    }),
  ),
});
