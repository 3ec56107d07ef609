import { Injectable, Logger } from "@nestjs/common";
import { Command, CommandRunner, Option } from "nest-commander";
import { EtaMaintenanceService } from "../modules/trip-estimate/eta-maintenance.service";
import { printJson, readTripFile } from "./trip-file";

interface CliOptions {
  file?: string;
}

@Injectable()
@Command({
  name: "eta:backfill",
  description: "Geocode and compute ETAs for trips missing them; prints the updates as JSON",
})
export class EtaBackfillCommand extends CommandRunner {
  private readonly logger = new Logger(EtaBackfillCommand.name);

  constructor(private readonly etaMaintenanceService: EtaMaintenanceService) {
    super();
  }

  async run(_inputs: string[], options: CliOptions): Promise<void> {
    if (!options.file) {
      throw new Error("Missing --file (a JSON array of trips)");
    }

    const trips = await readTripFile(options.file);
    this.logger.log(`Backfilling ${trips.length} trips from ${options.file}`);

    printJson(await this.etaMaintenanceService.backfill(trips));
  }

  @Option({
    flags: "-f, --file [path]",
    description: "Path to a JSON array of trips",
  })
  parseFile(value: string): string {
    return value;
  }
}
