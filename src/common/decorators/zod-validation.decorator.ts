import { Body, Query } from "@nestjs/common";
import type { z } from "zod";
import { ZodValidationPipe, type ZodValidationPipeOptions } from "../pipes/zod-validation.pipe";

/**
 * Validate and transform the request body; failures become a 400 VALIDATION_ERROR problem
 */
export function ZodBody<T>(
  schema: z.ZodType<T>,
  options?: ZodValidationPipeOptions,
): ParameterDecorator {
  return Body(new ZodValidationPipe(schema, options));
}

export function ZodQuery<T>(
  schema: z.ZodType<T>,
  options?: ZodValidationPipeOptions,
): ParameterDecorator {
  return Query(new ZodValidationPipe(schema, options));
}
