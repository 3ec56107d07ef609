import { Injectable, Logger } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { z } from "zod";
import { EtaMaintenanceService } from "../modules/trip-estimate/eta-maintenance.service";
import { printJson, readTripFile } from "./trip-file";

interface CliOptions {
  file?: string;
  threshold?: number;
}

const thresholdSchema = z.coerce.number().int().positive();

@Injectable()
@Command({
  name: "eta:diagnose",
  description: "Compare provider geocodes for trips with suspiciously long ETAs; prints findings as JSON",
})
export class EtaDiagnoseCommand extends CommandRunner {
  private readonly logger = new Logger(EtaDiagnoseCommand.name);

  constructor(private readonly etaMaintenanceService: EtaMaintenanceService) {
    super();
  }

  async run(_inputs: string[], options: CliOptions): Promise<void> {
    if (!options.file) {
      throw new Error("Missing --file (a JSON array of trips)");
    }

    const trips = await readTripFile(options.file);
    this.logger.log(`Diagnosing ${trips.length} trips from ${options.file}`);

    printJson(await this.etaMaintenanceService.diagnose(trips, options.threshold));
  }

  @Option({
    flags: "-f, --file [path]",
    description: "Path to a JSON array of trips",
  })
  parseFile(value: string): string {
    return value;
  }

  @Option({
    flags: "-t, --threshold [seconds]",
    description: "Only trips with a stored ETA above this (default: ETA_FLAG_THRESHOLD_SECONDS)",
  })
  parseThreshold(value: string): number {
    const parsed = thresholdSchema.safeParse(value);
    if (!parsed.success) {
      throw new Error(`--threshold must be a positive whole number of seconds, got "${value}"`);
    }
    return parsed.data;
  }
}
