import { WilsonScorer } from '../../src/services/wilson-scorer.service';

describe('WilsonScorer', () => {
  describe('bounds', () => {
    it('should return the full interval when nothing was observed', () => {
      expect(WilsonScorer.bounds(0, 0)).toEqual({ lower: 0, upper: 1, exploration_bonus: 1 });
    });

    it('should return the full interval with a reduced bonus for a single observation', () => {
      expect(WilsonScorer.bounds(1, 0)).toEqual({ lower: 0, upper: 1, exploration_bonus: 0.7 });
      expect(WilsonScorer.bounds(0, 1)).toEqual({ lower: 0, upper: 1, exploration_bonus: 0.7 });
    });

    it('should match the textbook interval for 8 of 10 at 95%', () => {
      const bounds = WilsonScorer.bounds(8, 2, 0.95);

      expect(bounds.lower).toBeCloseTo(0.4902, 4);
      expect(bounds.upper).toBeCloseTo(0.9433, 4);
      expect(bounds.exploration_bonus).toBeCloseTo(1 / Math.sqrt(11), 10);
    });

    it('should treat negative and non-finite counts as zero', () => {
      expect(WilsonScorer.bounds(-5, Number.NaN)).toEqual({ lower: 0, upper: 1, exploration_bonus: 1 });
      expect(WilsonScorer.bounds(Number.POSITIVE_INFINITY, 0)).toEqual({ lower: 0, upper: 1, exploration_bonus: 1 });
    });

    it('should keep 0 <= lower <= upper <= 1 across a range of inputs', () => {
      const counts = [0, 0.25, 0.5, 1, 2, 3.7, 10, 42, 100];
      for (const successes of counts) {
        for (const failures of counts) {
          const { lower, upper } = WilsonScorer.bounds(successes, failures);
          expect(lower).toBeGreaterThanOrEqual(0);
          expect(upper).toBeLessThanOrEqual(1);
          expect(lower).toBeLessThanOrEqual(upper);
        }
      }
    });

    it('should widen as the confidence level rises', () => {
      const narrow = WilsonScorer.bounds(20, 10, 0.9);
      const wide = WilsonScorer.bounds(20, 10, 0.99);

      expect(wide.lower).toBeLessThan(narrow.lower);
      expect(wide.upper).toBeGreaterThan(narrow.upper);
    });

    it('should accept fractional decayed counts', () => {
      const bounds = WilsonScorer.bounds(1.5, 0.5);

      expect(bounds.exploration_bonus).toBeCloseTo(1 / Math.sqrt(3), 10);
      expect(bounds.lower).toBeGreaterThan(0);
    });
  });

  describe('zForConfidence', () => {
    it('should map the supported confidence levels', () => {
      expect(WilsonScorer.zForConfidence(0.9)).toBe(1.645);
      expect(WilsonScorer.zForConfidence(0.95)).toBe(1.96);
      expect(WilsonScorer.zForConfidence(0.99)).toBe(2.576);
    });

    it('should fall back to 1.96 for other levels', () => {
      expect(WilsonScorer.zForConfidence(0.8)).toBe(1.96);
    });
  });
});
