import { HttpException, HttpStatus } from "@nestjs/common";
import type { FieldError, ProblemDetails } from "./problem-details.interface";

export interface AppExceptionOptions {
  title?: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
}

export type AppProblemDetails = ProblemDetails & {
  errorCode: string;
  errors?: FieldError[];
  details?: Record<string, unknown>;
};

/**
 * Base exception class for all application-specific errors.
 * The response body follows RFC 7807 with the error code doubling as `type`.
 *
 * Module-specific exceptions (e.g. TripEstimateException) extend this and keep
 * their error codes next to the module.
 */
export class AppException extends HttpException {
  private readonly problem: AppProblemDetails;

  constructor(
    public readonly errorCode: string,
    message: string,
    status: HttpStatus,
    options: AppExceptionOptions = {},
  ) {
    const problem: AppProblemDetails = {
      type: errorCode,
      title: options.title ?? errorCode,
      status,
      detail: message,
      errorCode,
      ...(options.errors && { errors: options.errors }),
      ...(options.details && { details: options.details }),
    };

    super(problem, status);
    // HttpException only picks up a `message` key from object bodies
    this.message = message;
    this.problem = problem;
  }

  getErrorCode(): string {
    return this.errorCode;
  }

  getDetails(): Record<string, unknown> | undefined {
    return this.problem.details;
  }

  getProblem(): AppProblemDetails {
    return this.problem;
  }
}
