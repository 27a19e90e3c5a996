import "reflect-metadata";
import { container } from "tsyringe";
import { IScheduleSource } from "./adapters/schedule/schedule-source.interface";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ICsvProcessor } from "./services/csv-processor.interface";
import { ITariffCalculationService } from "./services/tariff-calculation.interface";
import { ITariffRepository } from "./services/tariff-repository.interface";
import { isSuccess } from "./types/result.types";
import { buildPortDuesRecords } from "./utils/port-dues-record.util";

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    const repository = container.resolve<ITariffRepository>("ITariffRepository");
    const scheduleSource = container.resolve<IScheduleSource>("IScheduleSource");
    const csvProcessor = container.resolve<ICsvProcessor>("ICsvProcessor");
    const calculationService = container.resolve<ITariffCalculationService>(
      "ITariffCalculationService",
    );

    // Publish the ingested schedule before any request is read
    const publishResult = await repository.publishFrom(scheduleSource);
    if (!isSuccess(publishResult)) {
      console.error(`No schedule published: ${publishResult.message}`);
      process.exit(1);
    }

    const inputs = await csvProcessor.readPortCalls(config.data.inputCsvPath);
    console.log(`Calculating dues for ${inputs.length} port calls from CSV...`);

    const batch = await calculationService.calculateBatch(inputs);

    const records = buildPortDuesRecords(
      inputs.map((input) => input.requestId),
      batch,
    );
    await csvProcessor.writePortDuesCsv(config.data.outputCsvPath, records);
    console.log(`Port dues CSV written to: ${config.data.outputCsvPath}`);

    console.log("\nCalculation Result (JSON):");
    console.log(JSON.stringify(batch, null, 2));
    process.exit(batch.errors.length === 0 ? 0 : 1);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

void main();
