import { LOCK_SWEEP_JOB_NAME, LockSweepJob, type Sweeper } from '../../src/jobs/lock-sweep.job';
import { JobRestoreService } from '../../src/services/job-restore.service';
import type { LockSweepLog } from '../../src/types/models';
import { MemoryJobStateStore } from '../fakes/memory-store';

class StubSweeper implements Sweeper {
  runs = 0;
  failure: Error | null = null;

  async sweep(now: Date = new Date()): Promise<LockSweepLog> {
    this.runs++;
    if (this.failure) throw this.failure;
    return {
      sweep_id: `sweep-${this.runs}`,
      swept_at: now,
      expired_count: 2,
      past_send_date_count: 1,
      duration_ms: 4,
    };
  }
}

describe('LockSweepJob', () => {
  let sweeper: StubSweeper;
  let state: MemoryJobStateStore;
  let job: LockSweepJob;

  beforeEach(() => {
    sweeper = new StubSweeper();
    state = new MemoryJobStateStore();
    job = new LockSweepJob(sweeper, state);
  });

  afterEach(async () => {
    await job.halt();
  });

  it('should accumulate sweep totals across runs', async () => {
    await job.runNow();
    const result = await job.runNow();

    expect(result).toMatchObject({ success: true, message: 'Sweep completed' });
    expect(job.getStatus().stats).toMatchObject({ totalRuns: 2, totalExpired: 4, totalPastSendDate: 2 });
    expect(state.states.get(LOCK_SWEEP_JOB_NAME)?.stats).toMatchObject({ totalRuns: 2 });
  });

  it('should report a failed sweep', async () => {
    sweeper.failure = new Error('timeout');

    const result = await job.runNow();

    expect(result).toMatchObject({ success: false, message: 'Sweep failed: timeout' });
    expect(job.getStatus().stats.lastError).toBe('timeout');
  });

  it('should keep running state in the store across start and stop', async () => {
    await job.start();
    expect(state.states.get(LOCK_SWEEP_JOB_NAME)?.is_running).toBe(true);

    await job.stop();
    expect(state.states.get(LOCK_SWEEP_JOB_NAME)?.is_running).toBe(false);
    expect(job.getStatus().isRunning).toBe(false);
  });
});

describe('JobRestoreService', () => {
  it('should resume jobs that were running and skip the rest', async () => {
    const state = new MemoryJobStateStore();
    const running = new LockSweepJob(new StubSweeper(), state);
    const idleState = new MemoryJobStateStore();
    const idle = new LockSweepJob(new StubSweeper(), idleState);
    await state.saveRunningState(LOCK_SWEEP_JOB_NAME, true);

    const service = new JobRestoreService([
      { name: 'running', job: running },
      { name: 'idle', job: idle },
    ]);

    const outcome = await service.restoreAllJobs();
    await service.haltAllJobs();

    expect(outcome).toEqual({ restored: ['running'], skipped: ['idle'], failed: [] });
    expect(idleState.states.get(LOCK_SWEEP_JOB_NAME)?.config).toEqual({ intervalMinutes: 60, enabled: true });
    expect(running.getStatus().isRunning).toBe(true);
  });
});
