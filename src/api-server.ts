import "reflect-metadata";
import { container } from "tsyringe";
import { IScheduleSource } from "./adapters/schedule/schedule-source.interface";
import { createApp } from "./api/app";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ITariffRepository } from "./services/tariff-repository.interface";

async function start() {
  // Initialize DI container (same as index.ts)
  const config = loadConfig();
  setupDI(config);

  const repository = container.resolve<ITariffRepository>("ITariffRepository");
  const publishResult = await repository.publishFrom(
    container.resolve<IScheduleSource>("IScheduleSource"),
  );
  console.log(`[API] Initial schedule: ${publishResult.message}`);

  const app = createApp(container);
  app.listen(config.apiPort, () => {
    console.log(`API Server running on http://localhost:${config.apiPort}`);
    console.log(`Health check: http://localhost:${config.apiPort}/health`);
  });
}

start().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
