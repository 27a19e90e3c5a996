import { injectable } from 'tsyringe';
import { AmbiguousTierError, NotFoundError } from '../errors/tariff.errors';
import {
  ALL_PORTS,
  EffectiveRange,
  ExemptionCondition,
  RateTier,
  ResolvedItem,
  TariffSchedule
} from '../types/tariff.types';
import { VesselProfile } from '../types/vessel.types';
import { isWithinRange, toCalendarDate } from '../utils/date.util';
import { evaluatePredicate } from '../utils/flag-predicate.util';
import { IRateResolver } from './rate-resolver.interface';

interface ScopedRow extends EffectiveRange {
  port: string;
  dueType: string;
}

function containsTonnage(tier: RateTier, grossTonnage: number): boolean {
  return grossTonnage >= tier.minGt && (tier.maxGt === null || grossTonnage < tier.maxGt);
}

@injectable()
export class RateResolverService implements IRateResolver {
  resolve(schedule: TariffSchedule, profile: VesselProfile): ResolvedItem[] {
    const callDate = toCalendarDate(profile.arrivalDate);
    const inForce = (row: ScopedRow): boolean =>
      (row.port === profile.port || row.port === ALL_PORTS) &&
      isWithinRange(callDate, row.effectiveFrom, row.effectiveTo);
    const appliesTo = (row: ScopedRow, dueType: string): boolean =>
      row.dueType === dueType && inForce(row);

    // A call outside every effective window has no tariff, not a zero bill
    const rows: ScopedRow[] = [...schedule.rateTiers, ...schedule.feeRules, ...schedule.exemptions];
    if (!rows.some(inForce)) {
      throw new NotFoundError(profile.port, schedule.version);
    }

    const resolved: ResolvedItem[] = [];

    for (const dueType of schedule.dueTypes) {
      const tiers = schedule.rateTiers.filter(
        tier => appliesTo(tier, dueType) && containsTonnage(tier, profile.grossTonnage)
      );
      if (tiers.length > 1) {
        throw new AmbiguousTierError(dueType, tiers.map(tier => tier.ruleId), schedule.version);
      }

      const fees = schedule.feeRules.filter(fee => appliesTo(fee, dueType));
      if (tiers.length === 0 && fees.length === 0) {
        // Not applicable to this vessel call
        continue;
      }

      const exemption = this.firstSatisfiedExemption(
        schedule.exemptions.filter(candidate => appliesTo(candidate, dueType)),
        profile
      );
      const withExemption = exemption ? { exemption } : {};

      for (const tier of tiers) {
        resolved.push({ kind: 'tier', rule: tier, ...withExemption });
      }
      for (const fee of fees) {
        resolved.push({ kind: 'fee', rule: fee, ...withExemption });
      }
    }

    return resolved;
  }

  private firstSatisfiedExemption(
    candidates: ExemptionCondition[],
    profile: VesselProfile
  ): ExemptionCondition | undefined {
    // Declared order; the first satisfied condition wins
    return candidates.find(candidate => evaluatePredicate(candidate, profile.flags) === 'satisfied');
  }
}
