import { Module } from "@nestjs/common";
import { TripEstimateModule } from "../modules/trip-estimate/trip-estimate.module";
import { EtaBackfillCommand } from "./eta-backfill";
import { EtaDiagnoseCommand } from "./eta-diagnose";

@Module({
  imports: [TripEstimateModule],
  providers: [EtaBackfillCommand, EtaDiagnoseCommand],
})
export class CommandsModule {}
