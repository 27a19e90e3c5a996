import { BatchCalculationResult, CalculationResult } from '../types/calculation.types';

export interface BatchCalculationInput {
  requestId: string;
  request: unknown;
}

export interface ITariffCalculationService {
  /**
   * Runs one untrusted request through the guardrail and the calculation core.
   * Rejects with the typed error of the failing stage; never returns a partial result.
   */
  calculate(rawRequest: unknown): Promise<CalculationResult>;

  calculateBatch(inputs: BatchCalculationInput[]): Promise<BatchCalculationResult>;
}
