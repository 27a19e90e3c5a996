// Structural checks run on a schedule before it is published

import { ALL_PORTS, FlagPredicate, RateTier, TariffSchedule } from '../types/tariff.types';
import { isOperationalFlagName, isValidFlagValue } from '../types/vessel.types';
import { isCalendarDate, rangesIntersect } from './date.util';

function portsIntersect(a: string, b: string): boolean {
  return a === b || a === ALL_PORTS || b === ALL_PORTS;
}

function gtRangesIntersect(a: RateTier, b: RateTier): boolean {
  const aEndsAfterBStarts = a.maxGt === null || a.maxGt > b.minGt;
  const bEndsAfterAStarts = b.maxGt === null || b.maxGt > a.minGt;
  return aEndsAfterBStarts && bEndsAfterAStarts;
}

/**
 * Pairs of tiers that could both match one vessel call: same due type,
 * intersecting ports, effective windows and tonnage ranges.
 */
export function findTierOverlaps(tiers: RateTier[]): Array<[RateTier, RateTier]> {
  const overlaps: Array<[RateTier, RateTier]> = [];
  for (let i = 0; i < tiers.length; i++) {
    for (let j = i + 1; j < tiers.length; j++) {
      const a = tiers[i];
      const b = tiers[j];
      if (
        a.dueType === b.dueType &&
        portsIntersect(a.port, b.port) &&
        rangesIntersect(a, b) &&
        gtRangesIntersect(a, b)
      ) {
        overlaps.push([a, b]);
      }
    }
  }
  return overlaps;
}

/**
 * Holes in the tonnage ladder of tiers that share a port, due type and
 * effective window. The ladder must be contiguous from its lowest bound.
 */
export function findTierGaps(tiers: RateTier[]): string[] {
  const ladders = new Map<string, RateTier[]>();
  for (const tier of tiers) {
    const key = [tier.port, tier.dueType, tier.effectiveFrom, tier.effectiveTo ?? ''].join('|');
    ladders.set(key, [...(ladders.get(key) ?? []), tier]);
  }

  const gaps: string[] = [];
  for (const ladder of ladders.values()) {
    const sorted = [...ladder].sort((a, b) => a.minGt - b.minGt);
    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1];
      const current = sorted[i];
      if (previous.maxGt !== null && previous.maxGt < current.minGt) {
        gaps.push(
          `gap between ${previous.ruleId} and ${current.ruleId}: no tier covers GT ${previous.maxGt} to ${current.minGt}`
        );
      }
    }
  }
  return gaps;
}

function checkPredicate(ruleId: string, predicate: FlagPredicate): string[] {
  const flag = predicate.flag;
  if (!isOperationalFlagName(flag)) {
    return [`${ruleId}: unknown flag ${flag}`];
  }

  const values = Array.isArray(predicate.value) ? predicate.value : [predicate.value];
  const isSetComparison = predicate.comparison === 'in' || predicate.comparison === 'not_in';
  if (isSetComparison !== Array.isArray(predicate.value)) {
    return [`${ruleId}: comparison ${predicate.comparison} does not fit value ${JSON.stringify(predicate.value)}`];
  }

  return values
    .filter(value => !isValidFlagValue(flag, value))
    .map(value => `${ruleId}: ${JSON.stringify(value)} is not a valid value for flag ${flag}`);
}

/**
 * Returns every integrity issue found in the schedule; an empty list means
 * it can be published.
 */
export function auditSchedule(schedule: TariffSchedule): string[] {
  const issues: string[] = [];
  const declaredDueTypes = new Set(schedule.dueTypes);
  const ports = new Set(schedule.ports);
  const seenRuleIds = new Set<string>();

  if (declaredDueTypes.size !== schedule.dueTypes.length) {
    issues.push('due types are declared more than once');
  }

  const rows = [...schedule.rateTiers, ...schedule.feeRules, ...schedule.exemptions];
  for (const row of rows) {
    if (seenRuleIds.has(row.ruleId)) {
      issues.push(`${row.ruleId}: duplicate rule id`);
    }
    seenRuleIds.add(row.ruleId);

    if (!declaredDueTypes.has(row.dueType)) {
      issues.push(`${row.ruleId}: due type ${row.dueType} is not declared`);
    }
    if (row.port !== ALL_PORTS && !ports.has(row.port)) {
      issues.push(`${row.ruleId}: port ${row.port} is not covered by the schedule`);
    }
    if (!isCalendarDate(row.effectiveFrom)) {
      issues.push(`${row.ruleId}: effective_from ${row.effectiveFrom} is not a calendar date`);
    }
    if (row.effectiveTo !== null) {
      if (!isCalendarDate(row.effectiveTo)) {
        issues.push(`${row.ruleId}: effective_to ${row.effectiveTo} is not a calendar date`);
      } else if (row.effectiveTo <= row.effectiveFrom) {
        issues.push(`${row.ruleId}: effective range is empty`);
      }
    }
  }

  for (const rule of [...schedule.rateTiers, ...schedule.feeRules]) {
    if (rule.minAmount !== undefined && rule.maxAmount !== undefined && rule.minAmount > rule.maxAmount) {
      issues.push(`${rule.ruleId}: min_amount exceeds max_amount`);
    }
  }

  for (const tier of schedule.rateTiers) {
    if (tier.maxGt !== null && tier.maxGt <= tier.minGt) {
      issues.push(`${tier.ruleId}: tonnage range is empty`);
    }
  }

  for (const fee of schedule.feeRules) {
    if (fee.condition) {
      issues.push(...checkPredicate(fee.ruleId, fee.condition));
    }
  }

  for (const exemption of schedule.exemptions) {
    issues.push(...checkPredicate(exemption.ruleId, exemption));
  }

  for (const [a, b] of findTierOverlaps(schedule.rateTiers)) {
    issues.push(`${a.ruleId} overlaps ${b.ruleId} for due type ${a.dueType}`);
  }
  issues.push(...findTierGaps(schedule.rateTiers));

  return issues;
}
