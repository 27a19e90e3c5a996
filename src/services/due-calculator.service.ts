import { injectable } from 'tsyringe';
import { CalculationError } from '../errors/tariff.errors';
import { CalculationTrace, DueLineItem } from '../types/calculation.types';
import { ExemptionEffect, FeeRule, RateTier, ResolvedItem } from '../types/tariff.types';
import { VesselProfile } from '../types/vessel.types';
import { stayDays } from '../utils/date.util';
import { evaluatePredicate } from '../utils/flag-predicate.util';
import { IDueCalculator } from './due-calculator.interface';

const GT_BILLING_UNIT = 100;

type PricedRule = RateTier | FeeRule;

@injectable()
export class DueCalculatorService implements IDueCalculator {
  compute(profile: VesselProfile, item: ResolvedItem): DueLineItem {
    const rule: PricedRule = item.rule;
    const conditionMet = item.kind === 'fee' ? this.checkCondition(item.rule, profile) : undefined;

    const trace = this.applyFormula(rule, profile);
    let amount = this.clamp(rule, trace);
    if (conditionMet === false) {
      amount = 0;
    }
    if (item.exemption) {
      amount = this.applyExemption(amount, item.exemption.effect);
    }

    return {
      dueType: rule.dueType,
      ruleId: rule.ruleId,
      source: item.kind,
      ...(item.kind === 'tier' && {
        tierApplied: { minGt: item.rule.minGt, maxGt: item.rule.maxGt }
      }),
      baseAmount: amount,
      currency: rule.currency,
      ...(item.exemption && {
        exemptionApplied: { ruleId: item.exemption.ruleId, effect: item.exemption.effect }
      }),
      ...(conditionMet !== undefined && { conditionMet }),
      calculation: trace
    };
  }

  /**
   * Returns undefined for unconditional fees. A conditional fee whose flag
   * is absent or of the wrong type cannot be priced.
   */
  private checkCondition(fee: FeeRule, profile: VesselProfile): boolean | undefined {
    if (!fee.condition) {
      return undefined;
    }

    const outcome = evaluatePredicate(fee.condition, profile.flags);
    switch (outcome) {
      case 'missing':
        throw new CalculationError(fee.ruleId, `required flag ${fee.condition.flag} is absent`);
      case 'type_mismatch':
        throw new CalculationError(fee.ruleId, `flag ${fee.condition.flag} has the wrong type`);
      case 'satisfied':
        return true;
      case 'unsatisfied':
        return false;
    }
  }

  private applyFormula(rule: PricedRule, profile: VesselProfile): CalculationTrace {
    const base = { unit: rule.unit, rate: rule.rate, grossTonnage: profile.grossTonnage };
    const billingUnits = Math.ceil(profile.grossTonnage / GT_BILLING_UNIT);

    switch (rule.unit) {
      case 'flat':
        return { ...base, billedQuantity: 1, formulaAmount: rule.rate };
      case 'per_gt':
        return {
          ...base,
          billedQuantity: profile.grossTonnage,
          formulaAmount: rule.rate * profile.grossTonnage
        };
      case 'per_100gt':
        return { ...base, billedQuantity: billingUnits, formulaAmount: rule.rate * billingUnits };
      case 'per_gt_per_day': {
        const days = stayDays(profile.arrivalDate, profile.departureDate);
        return {
          ...base,
          billedQuantity: profile.grossTonnage,
          stayDays: days,
          formulaAmount: rule.rate * profile.grossTonnage * days
        };
      }
      case 'per_100gt_per_day': {
        const days = stayDays(profile.arrivalDate, profile.departureDate);
        return {
          ...base,
          billedQuantity: billingUnits,
          stayDays: days,
          formulaAmount: rule.rate * billingUnits * days
        };
      }
    }
  }

  /** Caps apply to the formula amount, before any exemption. */
  private clamp(rule: PricedRule, trace: CalculationTrace): number {
    if (rule.minAmount !== undefined && trace.formulaAmount < rule.minAmount) {
      trace.clampedTo = 'min';
      return rule.minAmount;
    }
    if (rule.maxAmount !== undefined && trace.formulaAmount > rule.maxAmount) {
      trace.clampedTo = 'max';
      return rule.maxAmount;
    }
    return trace.formulaAmount;
  }

  private applyExemption(amount: number, effect: ExemptionEffect): number {
    switch (effect.type) {
      case 'waive':
        return 0;
      case 'discount':
        return amount * (1 - effect.percent / 100);
    }
  }
}
