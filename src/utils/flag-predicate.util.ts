// Evaluates a schedule flag predicate against a vessel's operational flags

import { FlagPredicate } from '../types/tariff.types';
import { FlagValue, isOperationalFlagName, OperationalFlags } from '../types/vessel.types';

export type PredicateOutcome = 'satisfied' | 'unsatisfied' | 'missing' | 'type_mismatch';

function lookupFlag(flags: OperationalFlags, name: string): FlagValue | undefined {
  return isOperationalFlagName(name) ? flags[name] : undefined;
}

export function evaluatePredicate(predicate: FlagPredicate, flags: OperationalFlags): PredicateOutcome {
  const actual = lookupFlag(flags, predicate.flag);
  if (actual === undefined) {
    return 'missing';
  }

  const expected: FlagValue[] = Array.isArray(predicate.value) ? predicate.value : [predicate.value];
  if (expected.some(value => typeof value !== typeof actual)) {
    return 'type_mismatch';
  }

  const matches = expected.includes(actual);
  switch (predicate.comparison) {
    case 'eq':
    case 'in':
      return matches ? 'satisfied' : 'unsatisfied';
    case 'neq':
    case 'not_in':
      return matches ? 'unsatisfied' : 'satisfied';
  }
}
