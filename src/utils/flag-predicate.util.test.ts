import { FlagPredicate } from '../types/tariff.types';
import { evaluatePredicate } from './flag-predicate.util';

describe('evaluatePredicate', () => {
  describe('boolean flags', () => {
    const coasterOnly: FlagPredicate = { flag: 'coaster', comparison: 'eq', value: true };

    it('should be satisfied when the flag equals the value', () => {
      expect(evaluatePredicate(coasterOnly, { coaster: true })).toBe('satisfied');
    });

    it('should be unsatisfied when the flag differs', () => {
      expect(evaluatePredicate(coasterOnly, { coaster: false })).toBe('unsatisfied');
    });

    it('should invert the outcome for neq', () => {
      const notCoaster: FlagPredicate = { ...coasterOnly, comparison: 'neq' };
      expect(evaluatePredicate(notCoaster, { coaster: false })).toBe('satisfied');
      expect(evaluatePredicate(notCoaster, { coaster: true })).toBe('unsatisfied');
    });

    // Test: An absent flag is reported, never read as false
    it('should report a missing flag', () => {
      expect(evaluatePredicate(coasterOnly, {})).toBe('missing');
      expect(evaluatePredicate(coasterOnly, { government_vessel: true })).toBe('missing');
    });

    it('should report a value of the wrong type', () => {
      expect(evaluatePredicate(coasterOnly, { coaster: 'true' })).toBe('type_mismatch');
    });
  });

  describe('enum flags', () => {
    const smallCraft: FlagPredicate = {
      flag: 'vessel_type',
      comparison: 'in',
      value: ['fishing', 'pleasure']
    };

    it('should be satisfied when the value is in the set', () => {
      expect(evaluatePredicate(smallCraft, { vessel_type: 'pleasure' })).toBe('satisfied');
    });

    it('should be unsatisfied when the value is outside the set', () => {
      expect(evaluatePredicate(smallCraft, { vessel_type: 'tanker' })).toBe('unsatisfied');
    });

    it('should invert the outcome for not_in', () => {
      const notSmallCraft: FlagPredicate = { ...smallCraft, comparison: 'not_in' };
      expect(evaluatePredicate(notSmallCraft, { vessel_type: 'tanker' })).toBe('satisfied');
    });
  });

  it('should treat an unregistered flag name as missing', () => {
    const unknown: FlagPredicate = { flag: 'ice_class', comparison: 'eq', value: true };
    expect(evaluatePredicate(unknown, { coaster: true })).toBe('missing');
  });
});
