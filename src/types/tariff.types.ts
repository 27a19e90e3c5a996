// Tariff schedule domain - isolated from the ingestion payload format

import { FlagValue } from './vessel.types';

export type RateUnit =
  | 'flat'
  | 'per_gt'
  | 'per_gt_per_day'
  | 'per_100gt'
  | 'per_100gt_per_day';

export const RATE_UNITS: readonly RateUnit[] = [
  'flat',
  'per_gt',
  'per_gt_per_day',
  'per_100gt',
  'per_100gt_per_day'
];

/** Port code on a row that applies it to every port of the schedule. */
export const ALL_PORTS = '*';

export interface EffectiveRange {
  effectiveFrom: string;        // YYYY-MM-DD, inclusive
  effectiveTo: string | null;   // YYYY-MM-DD, exclusive; null = open-ended
}

interface PricedRule extends EffectiveRange {
  ruleId: string;
  port: string;
  dueType: string;
  rate: number;
  unit: RateUnit;
  currency: string;             // schedule currency unless the row overrides it
  minAmount?: number;
  maxAmount?: number;
}

export interface RateTier extends PricedRule {
  minGt: number;
  maxGt: number | null;         // exclusive; null = unbounded
}

export type FlagComparison = 'eq' | 'neq' | 'in' | 'not_in';

export interface FlagPredicate {
  flag: string;                 // checked against the flag registry on publish
  comparison: FlagComparison;
  value: FlagValue | string[];
}

export interface FeeRule extends PricedRule {
  /** Present on conditional fees only. */
  condition?: FlagPredicate;
}

export type ExemptionEffect =
  | { readonly type: 'waive' }
  | { readonly type: 'discount'; readonly percent: number };

export interface ExemptionCondition extends EffectiveRange, FlagPredicate {
  ruleId: string;
  port: string;
  dueType: string;
  effect: ExemptionEffect;
}

export interface TariffSchedule {
  version: string;
  currency: string;
  ports: string[];
  dueTypes: string[];           // declaration order drives line item order
  rateTiers: RateTier[];
  feeRules: FeeRule[];
  exemptions: ExemptionCondition[];
}

/**
 * A tier or fee rule selected for one vessel call.
 * Tagged so the calculator can tell tiered from non-tiered rules.
 */
export type ResolvedRule =
  | { readonly kind: 'tier'; readonly rule: RateTier }
  | { readonly kind: 'fee'; readonly rule: FeeRule };

export type ResolvedItem = ResolvedRule & {
  readonly exemption?: ExemptionCondition;
};
