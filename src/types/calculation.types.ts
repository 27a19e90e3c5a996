// Calculation output - owned by the caller once returned

import { ExemptionEffect, RateUnit } from './tariff.types';

export interface TierRange {
  minGt: number;
  maxGt: number | null;
}

export interface AppliedExemption {
  ruleId: string;
  effect: ExemptionEffect;
}

/** How the base amount was reached, for auditing a line item. */
export interface CalculationTrace {
  unit: RateUnit;
  rate: number;
  grossTonnage: number;
  billedQuantity: number;       // GT, 100-GT units or 1 for flat rates
  stayDays?: number;            // per-day units only
  formulaAmount: number;        // before caps
  clampedTo?: 'min' | 'max';
}

export interface DueLineItem {
  dueType: string;
  ruleId: string;
  source: 'tier' | 'fee';
  tierApplied?: TierRange;
  baseAmount: number;
  currency: string;
  exemptionApplied?: AppliedExemption;
  conditionMet?: boolean;       // conditional fees only
  calculation: CalculationTrace;
}

export type CurrencyTotals = Record<string, number>;

export enum ExplanationStatus {
  ANCHORED = 'ANCHORED',
  NOT_REQUESTED = 'NOT_REQUESTED',
  UNAVAILABLE = 'UNAVAILABLE',
  TIMED_OUT = 'TIMED_OUT'
}

/**
 * Explanation lookup outcome as discriminated union.
 * Only ANCHORED carries references; the others degrade to an empty set.
 */
export type ExplanationResult =
  | {
      readonly status: ExplanationStatus.ANCHORED;
      readonly references: Record<string, string>;
    }
  | {
      readonly status: ExplanationStatus.NOT_REQUESTED;
    }
  | {
      readonly status: ExplanationStatus.UNAVAILABLE | ExplanationStatus.TIMED_OUT;
      readonly error: string;
    };

export interface CalculationResult {
  lineItems: DueLineItem[];
  totals: CurrencyTotals;
  scheduleVersion: string;
  explanationRefs?: Record<string, string>;
  explanationStatus?: ExplanationStatus;
}

export enum CalculationStage {
  RECEIVED = 'RECEIVED',
  VALIDATED = 'VALIDATED',
  RESOLVED = 'RESOLVED',
  COMPUTED = 'COMPUTED',
  AGGREGATED = 'AGGREGATED',
  EXPLAINED = 'EXPLAINED',
  COMPLETED = 'COMPLETED'
}

export interface BatchCalculationError {
  requestId: string;
  errorType: string;
  message: string;
}

export interface BatchCalculationRecord {
  requestId: string;
  result: CalculationResult;
}

export interface BatchCalculationResult {
  records: BatchCalculationRecord[];
  errors: BatchCalculationError[];
}

/** Type guard for the only explanation outcome that carries references. */
export function isExplanationAnchored(
  result: ExplanationResult
): result is { readonly status: ExplanationStatus.ANCHORED; readonly references: Record<string, string> } {
  return result.status === ExplanationStatus.ANCHORED;
}
