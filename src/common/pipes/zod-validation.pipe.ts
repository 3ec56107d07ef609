import { HttpStatus, PipeTransform } from "@nestjs/common";
import type { z } from "zod";
import { AppException } from "../errors/app.exception";
import type { FieldError } from "../errors/problem-details.interface";

export type ExceptionFactory = (errors: FieldError[]) => Error;
export type ZodValidationPipeOptions = {
  exceptionFactory?: ExceptionFactory;
};

const ROOT_FIELD_ERROR = "_root";

export function mapZodIssuesToFieldErrors(
  issues: ReadonlyArray<{ path: PropertyKey[]; code?: string; message: string }>,
): FieldError[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.map(String).join(".") : ROOT_FIELD_ERROR,
    code: issue.code,
    message: issue.message,
  }));
}

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(
    private readonly schema: z.ZodType<T>,
    private readonly options?: ZodValidationPipeOptions,
  ) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (result.success) {
      return result.data;
    }

    const errors = mapZodIssuesToFieldErrors(result.error.issues);

    if (this.options?.exceptionFactory) {
      throw this.options.exceptionFactory(errors);
    }

    throw new AppException(
      "VALIDATION_ERROR",
      "One or more validation errors occurred",
      HttpStatus.BAD_REQUEST,
      { title: "Validation Failed", errors },
    );
  }
}
