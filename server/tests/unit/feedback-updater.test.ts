import { BanditStatStore } from '../../src/services/bandit-stat-store.service';
import { FeedbackUpdater, type FeedbackOptions } from '../../src/services/feedback-updater.service';
import { MemoryBanditStatRepository, MemoryOutcomeStore } from '../fakes/memory-store';
import { makeOutcome, makeStat } from '../fakes/factories';

const NOW = new Date('2026-03-10T12:00:00Z');

const OPTIONS: FeedbackOptions = {
  decayHalfLifeDays: 14,
  updatesPerDay: 4,
  lookbackHours: 48,
  medianWindowDays: 30,
  statCountCap: 100,
  confidenceLevel: 0.95,
};

const DECAY = BanditStatStore.decayFactor(14, 4);

function seedOutcomes(): MemoryOutcomeStore {
  return new MemoryOutcomeStore([
    // Delivery EMVs 10, 2 and 6: alice's median is 6
    makeOutcome({ caption_id: 'c1', sent_at: new Date('2026-03-09T10:00:00Z'), earnings: 100 }),
    makeOutcome({ caption_id: 'c2', sent_at: new Date('2026-03-09T11:00:00Z'), earnings: 20 }),
    makeOutcome({ caption_id: 'c3', sent_at: new Date('2026-03-09T12:00:00Z'), earnings: 60 }),
    makeOutcome({ caption_id: 'c4', sent_at: new Date('2026-03-09T13:00:00Z'), viewed_count: 0, purchased_count: 0 }),
    makeOutcome({ caption_id: 'c5', sent_at: new Date('2026-02-01T12:00:00Z'), earnings: 1000 }),
  ]);
}

describe('FeedbackUpdater', () => {
  describe('deliveryEmv', () => {
    it('should scale earnings by the conversion among viewers', () => {
      const outcome = makeOutcome({
        caption_id: 'c1',
        sent_at: NOW,
        viewed_count: 4,
        purchased_count: 1,
        earnings: 20,
      });

      expect(FeedbackUpdater.deliveryEmv(outcome)).toBe(5);
    });

    it('should be zero for unviewed deliveries', () => {
      const outcome = makeOutcome({ caption_id: 'c1', sent_at: NOW, viewed_count: 0, purchased_count: 3 });

      expect(FeedbackUpdater.deliveryEmv(outcome)).toBe(0);
    });
  });

  describe('rollup', () => {
    it('should count deliveries above the creator median as successes', () => {
      const pairs = FeedbackUpdater.rollup(
        [
          makeOutcome({ caption_id: 'c1', sent_at: new Date('2026-03-09T10:00:00Z'), earnings: 100 }),
          makeOutcome({ caption_id: 'c1', sent_at: new Date('2026-03-09T09:00:00Z'), earnings: 30 }),
        ],
        new Map([['alice', 5]])
      );

      expect([...pairs.values()]).toEqual([
        {
          caption_id: 'c1',
          creator_id: 'alice',
          new_successes: 1,
          new_failures: 1,
          observations: 2,
          emv_sum: 13,
          revenue: 130,
          last_emv: 10,
        },
      ]);
    });

    it('should skip creators without a median', () => {
      const pairs = FeedbackUpdater.rollup(
        [makeOutcome({ caption_id: 'c1', creator_id: 'bob', sent_at: NOW })],
        new Map([['alice', 5]])
      );

      expect(pairs.size).toBe(0);
    });
  });

  describe('run', () => {
    it('should classify, decay and rank the whole ledger in one pass', async () => {
      const repository = new MemoryBanditStatRepository([
        makeStat({ caption_id: 'c9', creator_id: 'alice', successes: 10, failures: 10, total_observations: 20, avg_emv: 4 }),
      ]);
      const updater = new FeedbackUpdater(seedOutcomes(), new BanditStatStore(repository), OPTIONS);

      const result = await updater.run(NOW);

      expect(result).toMatchObject({ outcomesRead: 3, pairsObserved: 3, statsWritten: 4, skippedCreators: [] });
      expect(result.since).toEqual(new Date('2026-03-08T12:00:00Z'));
      expect(repository.upsertCalls).toBe(1);

      const c1 = repository.get('c1', 'alice');
      expect(c1?.successes).toBeCloseTo(DECAY + 1, 10);
      expect(c1?.failures).toBeCloseTo(DECAY, 10);
      expect(c1?.avg_emv).toBe(10);
      expect(c1?.total_revenue).toBe(100);
      expect(c1?.total_observations).toBe(1);

      // EMV equal to the median is not a success
      expect(repository.get('c3', 'alice')?.failures).toBeCloseTo(DECAY + 1, 10);
      expect(repository.get('c9', 'alice')?.successes).toBeCloseTo(10 * DECAY, 10);

      expect(
        ['c1', 'c2', 'c3', 'c9'].map((id) => repository.get(id, 'alice')?.performance_percentile)
      ).toEqual([100, 0, 66, 33]);
      expect(repository.get('c4', 'alice')).toBeUndefined();
    });

    it('should only read outcomes after the watermark but still decay every row', async () => {
      const repository = new MemoryBanditStatRepository([
        makeStat({ caption_id: 'c9', creator_id: 'alice', successes: 10, failures: 10, total_observations: 20, avg_emv: 4 }),
      ]);
      const updater = new FeedbackUpdater(seedOutcomes(), new BanditStatStore(repository), OPTIONS);
      const watermark = new Date('2026-03-09T11:30:00Z');

      const result = await updater.run(NOW, watermark);

      expect(result.since).toBe(watermark);
      expect(result.outcomesRead).toBe(1);
      expect(repository.get('c1', 'alice')).toBeUndefined();
      expect(repository.get('c3', 'alice')?.failures).toBeCloseTo(DECAY + 1, 10);
      expect(repository.get('c9', 'alice')?.failures).toBeCloseTo(10 * DECAY, 10);
    });

    it('should fold outcomes ingested after the watermark even when sent before it', async () => {
      let clock = new Date('2026-03-10T04:00:00Z');
      const outcomes = new MemoryOutcomeStore([], () => clock);
      const repository = new MemoryBanditStatRepository();
      const updater = new FeedbackUpdater(outcomes, new BanditStatStore(repository), OPTIONS);

      await outcomes.insertMany([
        makeOutcome({ caption_id: 'c1', sent_at: new Date('2026-03-10T02:00:00Z'), earnings: 100 }),
      ]);
      const first = await updater.run(new Date('2026-03-10T06:00:00Z'));

      clock = new Date('2026-03-10T07:00:00Z');
      await outcomes.insertMany([
        makeOutcome({ caption_id: 'c2', sent_at: new Date('2026-03-10T05:30:00Z'), earnings: 20 }),
      ]);
      const second = await updater.run(NOW, first.until);

      expect(first.outcomesRead).toBe(1);
      expect(second.outcomesRead).toBe(1);
      // EMVs 10 and 2 put alice's median at 6
      expect(repository.get('c2', 'alice')?.failures).toBeCloseTo(DECAY + 1, 10);
      expect(repository.get('c2', 'alice')?.total_observations).toBe(1);
      expect(repository.get('c1', 'alice')?.total_observations).toBe(1);
    });

    it('should never look back past the lookback window', async () => {
      const updater = new FeedbackUpdater(
        seedOutcomes(),
        new BanditStatStore(new MemoryBanditStatRepository()),
        OPTIONS
      );

      const result = await updater.run(NOW, new Date('2026-01-01T00:00:00Z'));

      expect(result.since).toEqual(new Date('2026-03-08T12:00:00Z'));
      expect(result.outcomesRead).toBe(3);
    });

    it('should write nothing when the ledger and the batch are empty', async () => {
      const repository = new MemoryBanditStatRepository();
      const updater = new FeedbackUpdater(new MemoryOutcomeStore(), new BanditStatStore(repository), OPTIONS);

      const result = await updater.run(NOW);

      expect(result.statsWritten).toBe(0);
      expect(repository.upsertCalls).toBe(0);
    });
  });
});
