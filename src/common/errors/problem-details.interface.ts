/**
 * RFC 7807 Problem Details body returned for every handled error.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetails {
  /** Machine-readable problem type, e.g. "VALIDATION_ERROR" */
  type: string;
  title: string;
  status: number;
  detail: string;
  /** Request path the problem occurred on */
  instance?: string;
}

/**
 * Individual field validation error. Nested fields use dot notation: "trip.originCoordinate.latitude"
 */
export interface FieldError {
  field: string;
  code?: string;
  message: string;
}
