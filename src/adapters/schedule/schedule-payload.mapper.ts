import {
  ExemptionCondition,
  FeeRule,
  RateTier,
  TariffSchedule
} from '../../types/tariff.types';
import { SchedulePayload, SchedulePayloadSchema } from '../../types/schedule-payload.types';
import { Result } from '../../types/result.types';

type PricedRulePayload = SchedulePayload['rate_tiers'][number] | SchedulePayload['fee_rules'][number];

function mapPricedRule(row: PricedRulePayload, scheduleCurrency: string) {
  return {
    ruleId: row.rule_id,
    port: row.port,
    dueType: row.due_type,
    rate: row.rate,
    unit: row.unit,
    currency: row.currency ?? scheduleCurrency,
    ...(row.min_amount !== undefined && { minAmount: row.min_amount }),
    ...(row.max_amount !== undefined && { maxAmount: row.max_amount }),
    effectiveFrom: row.effective_from,
    effectiveTo: row.effective_to
  };
}

export function mapPayloadToSchedule(payload: SchedulePayload): TariffSchedule {
  const rateTiers: RateTier[] = payload.rate_tiers.map(row => ({
    ...mapPricedRule(row, payload.currency),
    minGt: row.min_gt,
    maxGt: row.max_gt
  }));

  const feeRules: FeeRule[] = payload.fee_rules.map(row => ({
    ...mapPricedRule(row, payload.currency),
    ...(row.condition && { condition: { ...row.condition } })
  }));

  const exemptions: ExemptionCondition[] = payload.exemptions.map(row => ({
    ruleId: row.rule_id,
    port: row.port,
    dueType: row.due_type,
    flag: row.flag,
    comparison: row.comparison,
    value: row.value,
    effect: row.effect,
    effectiveFrom: row.effective_from,
    effectiveTo: row.effective_to
  }));

  return {
    version: payload.version,
    currency: payload.currency,
    ports: [...payload.ports],
    dueTypes: [...payload.due_types],
    rateTiers,
    feeRules,
    exemptions
  };
}

/**
 * Validates an untrusted ingestion payload and maps it to the domain.
 * Structural problems are reported per path; semantic integrity is checked
 * by the repository on publish.
 */
export function parseSchedulePayload(raw: unknown): Result<TariffSchedule> {
  const validationResult = SchedulePayloadSchema.safeParse(raw);

  if (!validationResult.success) {
    const errors = validationResult.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    return {
      success: false,
      message: `Schedule payload validation failed: ${errors}`
    };
  }

  const schedule = mapPayloadToSchedule(validationResult.data);
  return {
    success: true,
    data: schedule,
    message: `Schedule ${schedule.version} parsed with ${schedule.rateTiers.length} tier(s), ${schedule.feeRules.length} fee rule(s) and ${schedule.exemptions.length} exemption(s)`
  };
}
