import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { CommandFactory } from "nest-commander";
import { AppModule } from "./app.module";

async function bootstrap(): Promise<void> {
  await CommandFactory.run(AppModule, {
    logger: ["log", "warn", "error"],
    errorHandler: (error) => {
      new Logger("Cli").error(error.message);
      process.exit(1);
    },
  });
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  new Logger("Cli").error(message);
  process.exit(1);
});
