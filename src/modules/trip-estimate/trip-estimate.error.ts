import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import type { FieldError } from "../../common/errors/problem-details.interface";

export const TripEstimateErrorCode = {
  INVALID_TRIP_FILE: "INVALID_TRIP_FILE",
} as const;

export class TripEstimateException extends AppException {}

export class InvalidTripFileException extends TripEstimateException {
  constructor(filePath: string, reason: string, errors?: FieldError[]) {
    super(
      TripEstimateErrorCode.INVALID_TRIP_FILE,
      `Cannot read trips from ${filePath}: ${reason}`,
      HttpStatus.BAD_REQUEST,
      {
        title: "Invalid Trip File",
        errors,
        details: { filePath },
      },
    );
  }
}
