import { AssignmentSweeper } from '../../src/services/assignment-sweeper.service';
import { MemoryAssignmentStore } from '../fakes/memory-store';
import { makeAssignment } from '../fakes/factories';

const NOW = new Date('2026-03-10T12:00:00Z');

describe('AssignmentSweeper', () => {
  it('should deactivate expired and past-dated reservations and log the sweep', async () => {
    const store = new MemoryAssignmentStore();
    store.seed([
      makeAssignment({ caption_id: 'expired', scheduled_date: '2026-03-02' }),
      makeAssignment({ caption_id: 'sent', scheduled_date: '2026-03-09' }),
      makeAssignment({ caption_id: 'today', scheduled_date: '2026-03-10' }),
      makeAssignment({ caption_id: 'upcoming', scheduled_date: '2026-03-12' }),
      makeAssignment({ caption_id: 'released', scheduled_date: '2026-03-01', is_active: false }),
    ]);

    const log = await new AssignmentSweeper(store).sweep(NOW);

    expect(log).toMatchObject({ swept_at: NOW, expired_count: 1, past_send_date_count: 1 });
    expect(log.sweep_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(store.sweeps).toEqual([log]);
    expect(store.active().map((r) => r.caption_id)).toEqual(['today', 'upcoming']);
    expect(store.rows.map((r) => r.deactivation_reason)).toEqual(['expired', 'past_send_date', null, null, null]);
  });

  it('should record a sweep even when nothing changed', async () => {
    const store = new MemoryAssignmentStore();

    const log = await new AssignmentSweeper(store).sweep(NOW);

    expect(log.expired_count + log.past_send_date_count).toBe(0);
    expect(store.sweeps).toHaveLength(1);
  });
});
