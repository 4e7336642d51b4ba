import { BanditStatStore, type FoldOptions } from '../../src/services/bandit-stat-store.service';
import { MemoryBanditStatRepository } from '../fakes/memory-store';
import { makeStat } from '../fakes/factories';

const NOW = new Date('2026-03-10T12:00:00Z');

function options(overrides: Partial<FoldOptions> = {}): FoldOptions {
  return { decay: 1, cap: 100, confidence: 0.95, now: NOW, ...overrides };
}

function observation(newSuccesses: number, newFailures: number, emvSum = 0, revenue = 0) {
  const observations = newSuccesses + newFailures;
  return {
    new_successes: newSuccesses,
    new_failures: newFailures,
    observations,
    emv_sum: emvSum,
    revenue,
    last_emv: observations > 0 ? emvSum / observations : 0,
  };
}

describe('BanditStatStore', () => {
  describe('prior', () => {
    it('should describe an unobserved pair as Beta(1,1)', () => {
      const prior = BanditStatStore.prior('c1', 'alice');

      expect(prior.successes).toBe(1);
      expect(prior.failures).toBe(1);
      expect(prior.total_observations).toBe(0);
      expect(prior.performance_percentile).toBeNull();
      expect(prior.confidence_lower).toBeCloseTo(0.0945, 4);
      expect(prior.confidence_upper).toBeCloseTo(0.9055, 4);
    });
  });

  describe('decayFactor', () => {
    it('should halve the weight after one half-life of updates', () => {
      const decay = BanditStatStore.decayFactor(14, 4);

      expect(Math.pow(decay, 56)).toBeCloseTo(0.5, 10);
    });

    it('should not decay when the cadence is zero', () => {
      expect(BanditStatStore.decayFactor(14, 0)).toBe(1);
    });
  });

  describe('fold', () => {
    it('should keep about half of the counts after 56 updates without observations', () => {
      const decay = BanditStatStore.decayFactor(14, 4);
      let stat = makeStat({ caption_id: 'c1', creator_id: 'alice', successes: 80, failures: 20, total_observations: 100 });

      for (let i = 0; i < 56; i++) {
        stat = BanditStatStore.fold(stat, null, options({ decay }));
      }

      expect(Math.abs(stat.successes - 40) / 40).toBeLessThanOrEqual(0.02);
      expect(Math.abs(stat.failures - 10) / 10).toBeLessThanOrEqual(0.02);
      expect(stat.total_observations).toBe(100);
    });

    it('should decay before adding new counts', () => {
      const stat = makeStat({ caption_id: 'c1', creator_id: 'alice', successes: 10, failures: 4, total_observations: 14 });

      const folded = BanditStatStore.fold(stat, observation(3, 1), options({ decay: 0.5 }));

      expect(folded.successes).toBe(8);
      expect(folded.failures).toBe(3);
      expect(folded.total_observations).toBe(18);
    });

    it('should cap counts', () => {
      const stat = makeStat({ caption_id: 'c1', creator_id: 'alice', successes: 99, failures: 0 });

      const folded = BanditStatStore.fold(stat, observation(5, 0), options({ cap: 100 }));

      expect(folded.successes).toBe(100);
    });

    it('should never produce negative counts', () => {
      const stat = makeStat({ caption_id: 'c1', creator_id: 'alice', successes: -3, failures: -1 });

      const folded = BanditStatStore.fold(stat, null, options());

      expect(folded.successes).toBe(0);
      expect(folded.failures).toBe(0);
    });

    it('should take the batch average EMV on first observation', () => {
      const stat = BanditStatStore.prior('c1', 'alice');

      const folded = BanditStatStore.fold(stat, observation(1, 1, 30, 80), options());

      expect(folded.avg_emv).toBe(15);
      expect(folded.total_revenue).toBe(80);
      expect(folded.last_emv_observed).toBe(15);
    });

    it('should blend EMV by decayed weight afterwards', () => {
      const stat = makeStat({
        caption_id: 'c1',
        creator_id: 'alice',
        successes: 3,
        failures: 1,
        total_observations: 4,
        avg_emv: 10,
      });

      // prior weight (3 + 1) * 0.5 = 2; (10 * 2 + 40) / (2 + 2)
      const folded = BanditStatStore.fold(stat, observation(1, 1, 40), options({ decay: 0.5 }));

      expect(folded.avg_emv).toBe(15);
    });

    it('should recompute bounds and stamp the update time', () => {
      const stat = makeStat({ caption_id: 'c1', creator_id: 'alice', successes: 6, failures: 2 });

      const folded = BanditStatStore.fold(stat, observation(2, 0), options());

      // 8 successes, 2 failures
      expect(folded.confidence_lower).toBeCloseTo(0.4902, 4);
      expect(folded.confidence_upper).toBeCloseTo(0.9433, 4);
      expect(folded.exploration_bonus).toBeCloseTo(1 / Math.sqrt(11), 10);
      expect(folded.last_updated).toBe(NOW);
    });
  });

  describe('assignPercentiles', () => {
    it('should rank avg_emv within each creator', () => {
      const stats = [
        makeStat({ caption_id: 'c1', creator_id: 'alice', avg_emv: 10 }),
        makeStat({ caption_id: 'c2', creator_id: 'alice', avg_emv: 30 }),
        makeStat({ caption_id: 'c3', creator_id: 'alice', avg_emv: 20 }),
        makeStat({ caption_id: 'c1', creator_id: 'bob', avg_emv: 99 }),
      ];

      const ranked = BanditStatStore.assignPercentiles(stats);

      expect(ranked.map((s) => s.performance_percentile)).toEqual([0, 100, 50, 0]);
    });

    it('should give ties the same rank and floor fractions', () => {
      const stats = [
        makeStat({ caption_id: 'c1', creator_id: 'alice', avg_emv: 5 }),
        makeStat({ caption_id: 'c2', creator_id: 'alice', avg_emv: 5 }),
        makeStat({ caption_id: 'c3', creator_id: 'alice', avg_emv: 7 }),
        makeStat({ caption_id: 'c4', creator_id: 'alice', avg_emv: 9 }),
      ];

      const ranked = BanditStatStore.assignPercentiles(stats);

      expect(ranked.map((s) => s.performance_percentile)).toEqual([0, 0, 66, 100]);
    });
  });

  describe('repository access', () => {
    it('should key a creator rows by caption id', async () => {
      const repository = new MemoryBanditStatRepository([
        makeStat({ caption_id: 'c1', creator_id: 'alice', successes: 4 }),
        makeStat({ caption_id: 'c2', creator_id: 'bob' }),
      ]);
      const store = new BanditStatStore(repository);

      const stats = await store.getForCreator('alice');

      expect([...stats.keys()]).toEqual(['c1']);
      expect(stats.get('c1')?.successes).toBe(4);
    });

    it('should skip the write for an empty batch', async () => {
      const repository = new MemoryBanditStatRepository();
      const store = new BanditStatStore(repository);

      await expect(store.saveAll([])).resolves.toBe(0);
      expect(repository.upsertCalls).toBe(0);
    });
  });
});
