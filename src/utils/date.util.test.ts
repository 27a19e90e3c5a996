import {
  isCalendarDate,
  isWithinRange,
  rangesIntersect,
  stayDays,
  toCalendarDate,
  toCanonicalInstant
} from './date.util';

describe('date.util', () => {
  describe('toCanonicalInstant', () => {
    it('should read a calendar date as midnight UTC', () => {
      expect(toCanonicalInstant('2024-01-10')).toBe('2024-01-10T00:00:00.000Z');
    });

    it('should convert an offset date-time to UTC', () => {
      expect(toCanonicalInstant('2024-01-10T08:30:00+02:00')).toBe('2024-01-10T06:30:00.000Z');
    });

    it('should accept Z date-times with milliseconds', () => {
      expect(toCanonicalInstant('2024-01-10T08:30:15.250Z')).toBe('2024-01-10T08:30:15.250Z');
    });

    // Test: Impossible or ambiguous values are rejected
    it.each([
      ['2024-02-30'],
      ['2023-02-29'],
      ['2024-13-01'],
      ['2024-01-10T08:30:00'],
      ['2024-01-10T24:00:00Z'],
      ['10/01/2024'],
      ['not a date'],
      ['']
    ])('should return null for %p', (value) => {
      expect(toCanonicalInstant(value)).toBeNull();
    });

    it('should accept a leap day', () => {
      expect(toCanonicalInstant('2024-02-29')).toBe('2024-02-29T00:00:00.000Z');
    });
  });

  describe('isCalendarDate', () => {
    it('should accept only real YYYY-MM-DD dates', () => {
      expect(isCalendarDate('2024-06-30')).toBe(true);
      expect(isCalendarDate('2024-06-31')).toBe(false);
      expect(isCalendarDate('2024-06-30T00:00:00Z')).toBe(false);
    });
  });

  describe('toCalendarDate', () => {
    it('should return the UTC date of an instant', () => {
      expect(toCalendarDate('2024-03-02T23:15:00.000Z')).toBe('2024-03-02');
    });
  });

  describe('stayDays', () => {
    it('should count whole days', () => {
      expect(stayDays('2024-01-10T00:00:00.000Z', '2024-01-13T00:00:00.000Z')).toBe(3);
    });

    // Test: A partial day is billed as a full day
    it('should round a partial day up', () => {
      expect(stayDays('2024-01-10T00:00:00.000Z', '2024-01-12T12:00:00.000Z')).toBe(3);
    });

    it('should bill at least one day', () => {
      expect(stayDays('2024-01-10T00:00:00.000Z', '2024-01-10T02:00:00.000Z')).toBe(1);
    });
  });

  describe('isWithinRange', () => {
    it('should include the start date and exclude the end date', () => {
      expect(isWithinRange('2024-01-01', '2024-01-01', '2024-07-01')).toBe(true);
      expect(isWithinRange('2024-06-30', '2024-01-01', '2024-07-01')).toBe(true);
      expect(isWithinRange('2024-07-01', '2024-01-01', '2024-07-01')).toBe(false);
      expect(isWithinRange('2023-12-31', '2024-01-01', '2024-07-01')).toBe(false);
    });

    it('should treat a null end as open-ended', () => {
      expect(isWithinRange('2099-01-01', '2024-01-01', null)).toBe(true);
    });
  });

  describe('rangesIntersect', () => {
    it('should not treat adjacent ranges as intersecting', () => {
      expect(
        rangesIntersect(
          { effectiveFrom: '2024-01-01', effectiveTo: '2024-07-01' },
          { effectiveFrom: '2024-07-01', effectiveTo: null }
        )
      ).toBe(false);
    });

    it('should detect an overlap with an open-ended range', () => {
      expect(
        rangesIntersect(
          { effectiveFrom: '2024-01-01', effectiveTo: null },
          { effectiveFrom: '2024-06-01', effectiveTo: '2024-09-01' }
        )
      ).toBe(true);
    });
  });
});
