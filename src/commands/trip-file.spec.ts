import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Test } from "@nestjs/testing";
import { EtaMaintenanceService } from "../modules/trip-estimate/eta-maintenance.service";
import { InvalidTripFileException } from "../modules/trip-estimate/trip-estimate.error";
import { EtaBackfillCommand } from "./eta-backfill";
import { EtaDiagnoseCommand } from "./eta-diagnose";
import { readTripFile } from "./trip-file";

describe("trip file commands", () => {
  let dir: string;

  const writeTrips = async (content: string) => {
    const filePath = join(dir, "trips.json");
    await writeFile(filePath, content, "utf8");
    return filePath;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ridepool-eta-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("readTripFile", () => {
    it("should parse trips and apply defaults", async () => {
      const filePath = await writeTrips(
        JSON.stringify([
          {
            origin: "Main St",
            destination: "Oak Ave",
            originCoordinate: { latitude: 40, longitude: -75 },
            etaSeconds: 1200,
            departTime: "2026-03-01T08:00:00.000Z",
          },
        ]),
      );

      await expect(readTripFile(filePath)).resolves.toEqual([
        {
          origin: "Main St",
          destination: "Oak Ave",
          originCoordinate: { latitude: 40, longitude: -75 },
          etaSeconds: 1200,
          seats: 1,
          departTime: new Date("2026-03-01T08:00:00.000Z"),
        },
      ]);
    });

    it("should reject a file that is not JSON", async () => {
      const filePath = await writeTrips("not json");

      await expect(readTripFile(filePath)).rejects.toThrow(`Cannot read trips from ${filePath}: file is not valid JSON`);
    });

    it("should report the fields of invalid trips", async () => {
      const filePath = await writeTrips(JSON.stringify([{ origin: "Main St", destination: "" }]));

      const error = await readTripFile(filePath).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InvalidTripFileException);
      expect(error).toMatchObject({ errorCode: "INVALID_TRIP_FILE" });
      if (error instanceof InvalidTripFileException) {
        expect(error.getProblem().errors).toEqual([
          { field: "0.destination", code: "too_small", message: "Destination address is required" },
        ]);
      }
    });

    it("should reject a missing file", async () => {
      await expect(readTripFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(InvalidTripFileException);
    });
  });

  describe("commands", () => {
    let maintenance: { backfill: ReturnType<typeof vi.fn>; diagnose: ReturnType<typeof vi.fn> };
    let backfillCommand: EtaBackfillCommand;
    let diagnoseCommand: EtaDiagnoseCommand;

    beforeEach(async () => {
      maintenance = {
        backfill: vi.fn().mockResolvedValue([{ tripIndex: 0, update: { etaSeconds: 308 } }]),
        diagnose: vi.fn().mockResolvedValue([]),
      };

      const module = await Test.createTestingModule({
        providers: [
          EtaBackfillCommand,
          EtaDiagnoseCommand,
          { provide: EtaMaintenanceService, useValue: maintenance },
        ],
      }).compile();

      backfillCommand = module.get(EtaBackfillCommand);
      diagnoseCommand = module.get(EtaDiagnoseCommand);
    });

    it("should print backfill updates as JSON", async () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const filePath = await writeTrips(JSON.stringify([{ origin: "A", destination: "B" }]));

      await backfillCommand.run([], { file: filePath });

      expect(maintenance.backfill).toHaveBeenCalledWith([{ origin: "A", destination: "B", seats: 1 }]);
      expect(write).toHaveBeenCalledWith(
        `${JSON.stringify([{ tripIndex: 0, update: { etaSeconds: 308 } }], null, 2)}\n`,
      );
    });

    it("should pass the threshold to the diagnosis", async () => {
      vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const filePath = await writeTrips("[]");
      await diagnoseCommand.run([], { file: filePath, threshold: diagnoseCommand.parseThreshold("3600") });

      expect(maintenance.diagnose).toHaveBeenCalledWith([], 3600);
    });

    it("should reject a threshold that is not a positive number", () => {
      expect(() => diagnoseCommand.parseThreshold("soon")).toThrow(
        '--threshold must be a positive whole number of seconds, got "soon"',
      );
    });

    it("should require a file", async () => {
      await expect(backfillCommand.run([], {})).rejects.toThrow(
        "Missing --file (a JSON array of trips)",
      );
    });
  });
});
