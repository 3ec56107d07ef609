import { readFile } from "node:fs/promises";
import { mapZodIssuesToFieldErrors } from "../common/pipes/zod-validation.pipe";
import { tripListSchema } from "../modules/trip-estimate/dto/trip.dto";
import type { Trip } from "../modules/trip-estimate/trip-estimate.interface";
import { InvalidTripFileException } from "../modules/trip-estimate/trip-estimate.error";

/**
 * Read a JSON array of trips, the same shape POST /api/trips/eta accepts
 */
export async function readTripFile(filePath: string): Promise<Trip[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidTripFileException(filePath, reason);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InvalidTripFileException(filePath, "file is not valid JSON");
  }

  const parsed = tripListSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidTripFileException(
      filePath,
      "one or more trips are invalid",
      mapZodIssuesToFieldErrors(parsed.error.issues),
    );
  }

  return parsed.data;
}

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}
