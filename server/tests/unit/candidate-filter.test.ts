import { BudgetEnforcer } from '../../src/services/budget-enforcer.service';
import { CandidateFilter, type FilterInput } from '../../src/services/candidate-filter.service';
import { DEFAULT_TRIGGER_WEEKLY_CAPS } from '../../src/config/bandit';
import { makeAssignment, makeCaption } from '../fakes/factories';

const NOW = new Date('2026-03-09T12:00:00Z');

function input(overrides: Partial<FilterInput>): FilterInput {
  return {
    creatorId: 'alice',
    targetDate: '2026-03-10',
    captions: [],
    activeAssignments: [],
    triggerUsage: new Map(),
    restriction: null,
    now: NOW,
    ...overrides,
  };
}

describe('CandidateFilter', () => {
  const filter = new CandidateFilter(new BudgetEnforcer(DEFAULT_TRIGGER_WEEKLY_CAPS), 7);

  describe('filter', () => {
    it('should drop inactive captions before counting the pool', () => {
      const result = filter.filter(
        input({
          captions: [makeCaption({ caption_id: 'c1' }), makeCaption({ caption_id: 'c2', is_active: false })],
        })
      );

      expect(result.eligible.map((c) => c.caption.caption_id)).toEqual(['c1']);
      expect(result.counts.total_available).toBe(1);
      expect(result.audit).toEqual([
        { caption_id: 'c2', rule_type: 'INACTIVE', rule_value: null, enforcement: 'HARD', stage: 'active' },
      ]);
    });

    it('should apply cooldown against reservations held by other creators', () => {
      const result = filter.filter(
        input({
          captions: [
            makeCaption({ caption_id: 'c1' }),
            makeCaption({ caption_id: 'c2' }),
            makeCaption({ caption_id: 'c3' }),
            makeCaption({ caption_id: 'c4' }),
          ],
          activeAssignments: [
            makeAssignment({ caption_id: 'c2', creator_id: 'bob', scheduled_date: '2026-03-05' }),
            makeAssignment({ caption_id: 'c3', creator_id: 'bob', scheduled_date: '2026-03-02' }),
            makeAssignment({
              caption_id: 'c4',
              creator_id: 'bob',
              scheduled_date: '2026-03-08',
              expires_at: new Date('2026-03-09T00:00:00Z'),
            }),
          ],
        })
      );

      expect(result.eligible.map((c) => c.caption.caption_id)).toEqual(['c1', 'c3', 'c4']);
      expect(result.counts.after_cooldown_filter).toBe(3);
      expect(result.audit).toEqual([
        { caption_id: 'c2', rule_type: 'COOLDOWN', rule_value: '2026-03-05', enforcement: 'HARD', stage: 'cooldown' },
      ]);
    });

    it('should exclude captions restricted for the creator', () => {
      const result = filter.filter(
        input({
          captions: [
            makeCaption({ caption_id: 'c1', restricted_creators: ['alice'] }),
            makeCaption({ caption_id: 'c2', restricted_creators: '["bob","alice"]' }),
            makeCaption({ caption_id: 'c3', restricted_creators: ['bob'] }),
          ],
        })
      );

      expect(result.eligible.map((c) => c.caption.caption_id)).toEqual(['c3']);
      expect(result.audit.map((a) => [a.caption_id, a.rule_type])).toEqual([
        ['c1', 'CREATOR_EXCLUDED'],
        ['c2', 'CREATOR_EXCLUDED'],
      ]);
    });

    it('should treat malformed restriction lists as unrestricted', () => {
      const captions = [
        makeCaption({ caption_id: 'c1', restricted_creators: '{not json' }),
        makeCaption({ caption_id: 'c2', restricted_creators: 42 }),
        makeCaption({ caption_id: 'c3', restricted_creators: [1, 2] }),
        makeCaption({ caption_id: 'c4', restricted_creators: '' }),
      ];

      const result = filter.filter(input({ captions }));

      expect(result.eligible).toHaveLength(4);
      expect(result.counts.after_restriction_filter).toBe(4);
    });

    it('should enforce hard rules and annotate soft patterns from the creator profile', () => {
      const restriction = CandidateFilter.parseRestrictionProfile(
        {
          restricted_categories: ['explicit'],
          restricted_price_tiers: ['vip'],
          hard_patterns: ['free\\s+trial'],
          soft_patterns: ['limited'],
        },
        'alice'
      );

      const result = filter.filter(
        input({
          restriction,
          captions: [
            makeCaption({ caption_id: 'c1', content_category: 'explicit' }),
            makeCaption({ caption_id: 'c2', price_tier: 'vip' }),
            makeCaption({ caption_id: 'c3', caption_text: 'Grab a FREE  trial today' }),
            makeCaption({ caption_id: 'c4', caption_text: 'Limited spots left' }),
            makeCaption({ caption_id: 'c5', caption_text: 'New set is up' }),
          ],
        })
      );

      expect(result.eligible.map((c) => [c.caption.caption_id, c.soft_matches])).toEqual([
        ['c4', ['limited']],
        ['c5', []],
      ]);
      expect(result.audit).toEqual([
        { caption_id: 'c1', rule_type: 'CATEGORY', rule_value: 'explicit', enforcement: 'HARD', stage: 'restriction' },
        { caption_id: 'c2', rule_type: 'PRICE_TIER', rule_value: 'vip', enforcement: 'HARD', stage: 'restriction' },
        {
          caption_id: 'c3',
          rule_type: 'PATTERN_HARD',
          rule_value: 'free\\s+trial',
          enforcement: 'HARD',
          stage: 'restriction',
        },
        { caption_id: 'c4', rule_type: 'PATTERN_SOFT', rule_value: 'limited', enforcement: 'SOFT', stage: 'restriction' },
      ]);
      expect(result.counts.after_restriction_filter).toBe(2);
    });

    it('should drop captions over their trigger budget and penalize those near it', () => {
      const result = filter.filter(
        input({
          captions: [
            makeCaption({ caption_id: 'c1', trigger_tag: 'scarcity' }),
            makeCaption({ caption_id: 'c2', trigger_tag: 'urgency' }),
            makeCaption({ caption_id: 'c3', trigger_tag: 'curiosity' }),
          ],
          triggerUsage: new Map([
            ['scarcity', 3],
            ['urgency', 4],
          ]),
        })
      );

      expect(result.eligible.map((c) => [c.caption.caption_id, c.budget_penalty])).toEqual([
        ['c2', -0.5],
        ['c3', 0],
      ]);
      expect(result.counts).toEqual({
        total_available: 3,
        after_cooldown_filter: 3,
        after_restriction_filter: 3,
        after_budget_filter: 2,
      });
      expect(result.audit.map((a) => [a.caption_id, a.rule_type, a.enforcement])).toEqual([
        ['c1', 'BUDGET', 'HARD'],
        ['c2', 'BUDGET', 'SOFT'],
      ]);
    });
  });

  describe('parseRestrictionProfile', () => {
    it('should skip unparsable patterns and keep the rest', () => {
      const profile = CandidateFilter.parseRestrictionProfile({ hard_patterns: ['(', 'promo'] }, 'alice');

      expect(profile?.hardPatterns.map((p) => p.source)).toEqual(['promo']);
    });

    it('should return null for malformed or inactive rows', () => {
      expect(CandidateFilter.parseRestrictionProfile({ restricted_categories: 'explicit' }, 'alice')).toBeNull();
      expect(CandidateFilter.parseRestrictionProfile({ is_active: false, hard_patterns: ['x'] }, 'alice')).toBeNull();
      expect(CandidateFilter.parseRestrictionProfile(null, 'alice')).toBeNull();
    });

    it('should accept rows with null columns', () => {
      const profile = CandidateFilter.parseRestrictionProfile(
        { restricted_categories: null, soft_patterns: ['deal'], is_active: true },
        'alice'
      );

      expect(profile?.categories.size).toBe(0);
      expect(profile?.softPatterns).toHaveLength(1);
    });
  });

  describe('parseRestrictedCreators', () => {
    it('should read arrays and JSON text', () => {
      expect(CandidateFilter.parseRestrictedCreators(['a', 'b'], 'c1')).toEqual(['a', 'b']);
      expect(CandidateFilter.parseRestrictedCreators('["a"]', 'c1')).toEqual(['a']);
    });

    it('should fail open on anything else', () => {
      expect(CandidateFilter.parseRestrictedCreators(null, 'c1')).toEqual([]);
      expect(CandidateFilter.parseRestrictedCreators('nope', 'c1')).toEqual([]);
      expect(CandidateFilter.parseRestrictedCreators({ alice: true }, 'c1')).toEqual([]);
    });
  });
});
