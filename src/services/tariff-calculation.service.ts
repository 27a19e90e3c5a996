import { inject, injectable } from "tsyringe";
import { TariffError } from "../errors/tariff.errors";
import {
  BatchCalculationError,
  BatchCalculationRecord,
  BatchCalculationResult,
  CalculationResult,
  CalculationStage,
  DueLineItem,
  isExplanationAnchored
} from "../types/calculation.types";
import { ResolvedItem, TariffSchedule } from "../types/tariff.types";
import { CalculationRequest } from "../types/vessel.types";
import { IAggregator } from "./aggregator.interface";
import { IDueCalculator } from "./due-calculator.interface";
import { IExplanationAnchor } from "./explanation-anchor.interface";
import { IGuardrailValidator } from "./guardrail-validator.interface";
import { IRateResolver } from "./rate-resolver.interface";
import { ITariffRepository } from "./tariff-repository.interface";
import { BatchCalculationInput, ITariffCalculationService } from "./tariff-calculation.interface";

@injectable()
export class TariffCalculationService implements ITariffCalculationService {
  constructor(
    @inject('IGuardrailValidator') private guardrail: IGuardrailValidator,
    @inject('ITariffRepository') private repository: ITariffRepository,
    @inject('IRateResolver') private resolver: IRateResolver,
    @inject('IDueCalculator') private calculator: IDueCalculator,
    @inject('IAggregator') private aggregator: IAggregator,
    @inject('IExplanationAnchor') private explanationAnchor: IExplanationAnchor,
    @inject('BatchSize') private batchSize: number,
  ) {}

  async calculate(rawRequest: unknown): Promise<CalculationResult> {
    // RECEIVED -> VALIDATED
    const validation = this.guardrail.validate(rawRequest);
    if (!validation.success) {
      throw validation.error;
    }
    const request = validation.data;

    // The snapshot is borrowed for the whole request, whatever gets published meanwhile
    const schedule = this.repository.getSnapshot(request.profile.port, request.scheduleVersion);

    const resolved = this.runStage(CalculationStage.RESOLVED, request, schedule, () =>
      this.resolver.resolve(schedule, request.profile),
    );

    const computed = this.runStage(CalculationStage.COMPUTED, request, schedule, () =>
      resolved.map((item: ResolvedItem) => this.calculator.compute(request.profile, item)),
    );

    // AGGREGATED
    const totals = this.aggregator.aggregate(computed);
    const lineItems: DueLineItem[] = this.aggregator.roundLineItems(computed);

    const result: CalculationResult = {
      lineItems,
      totals,
      scheduleVersion: schedule.version,
    };

    if (!request.includeExplanation) {
      return result;
    }

    // EXPLAINED is optional: a failed lookup never undoes the aggregated result
    const explanation = await this.explanationAnchor.anchor(lineItems, true);
    return {
      ...result,
      explanationRefs: isExplanationAnchored(explanation) ? explanation.references : {},
      explanationStatus: explanation.status,
    };
  }

  async calculateBatch(inputs: BatchCalculationInput[]): Promise<BatchCalculationResult> {
    const records: BatchCalculationRecord[] = [];
    const errors: BatchCalculationError[] = [];

    // Process each chunk sequentially, but requests within chunk in parallel
    for (const chunk of this.chunkArray(inputs, this.batchSize)) {
      const chunkResults = await Promise.allSettled(
        chunk.map((input) => this.calculate(input.request)),
      );

      chunkResults.forEach((outcome, index) => {
        const { requestId } = chunk[index];
        if (outcome.status === "fulfilled") {
          records.push({ requestId, result: outcome.value });
          return;
        }

        const reason: unknown = outcome.reason;
        errors.push({
          requestId,
          errorType: reason instanceof TariffError ? reason.code : "UNEXPECTED_ERROR",
          message: this.describeFailure(reason),
        });
      });
    }

    return { records, errors };
  }

  private runStage<T>(
    stage: CalculationStage,
    request: CalculationRequest,
    schedule: TariffSchedule,
    operation: () => T,
  ): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof TariffError && error.callerFacing) {
        throw error;
      }
      // Data defects are logged in full here and stay opaque to the caller
      console.error(
        `[Tariff Calculation] Failed before ${stage} for port ${request.profile.port}, schedule ${schedule.version}:`,
        error,
      );
      throw error;
    }
  }

  private describeFailure(reason: unknown): string {
    if (reason instanceof TariffError && !reason.callerFacing) {
      return "Calculation failed because of a tariff data defect";
    }
    return reason instanceof Error ? reason.message : String(reason);
  }

  private chunkArray<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size));
    }
    return chunks;
  }
}
