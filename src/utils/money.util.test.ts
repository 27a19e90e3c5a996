import { roundHalfUp, sumRounded } from './money.util';

describe('money.util', () => {
  describe('roundHalfUp', () => {
    // Test: Midpoint that binary floating point stores just below the half
    it('should round 100.005 up to 100.01', () => {
      expect(roundHalfUp(100.005)).toBe(100.01);
    });

    it('should round 1.005 up to 1.01', () => {
      expect(roundHalfUp(1.005)).toBe(1.01);
    });

    it('should round below the midpoint down', () => {
      expect(roundHalfUp(50.004)).toBe(50);
    });

    // Test: Half away from zero on negative amounts
    it('should round negative midpoints away from zero', () => {
      expect(roundHalfUp(-2.345)).toBe(-2.35);
    });

    it('should not produce negative zero', () => {
      expect(Object.is(roundHalfUp(-0.001), 0)).toBe(true);
    });

    it('should honour the requested number of decimals', () => {
      expect(roundHalfUp(7.25, 1)).toBe(7.3);
      expect(roundHalfUp(7.5, 0)).toBe(8);
    });

    it('should handle amounts written in exponent notation', () => {
      expect(roundHalfUp(1e-7)).toBe(0);
      expect(roundHalfUp(1.5e21)).toBe(1.5e21);
    });

    it('should reject non-finite amounts', () => {
      expect(() => roundHalfUp(Number.NaN)).toThrow(RangeError);
      expect(() => roundHalfUp(Number.POSITIVE_INFINITY)).toThrow('Cannot round non-finite amount Infinity');
    });
  });

  describe('sumRounded', () => {
    // Test: Items are rounded before they are summed
    it('should round each amount before summing', () => {
      // Arrange
      const amounts = [100.005, 50.004];

      // Act
      const total = sumRounded(amounts);

      // Assert: 100.01 + 50.00
      expect(total).toBe(150.01);
    });

    it('should return 0 for no amounts', () => {
      expect(sumRounded([])).toBe(0);
    });

    it('should absorb floating point drift in the sum', () => {
      expect(sumRounded([0.1, 0.2])).toBe(0.3);
    });
  });
});
