import { query } from '../../db/client.js';
import type { DeliveryOutcome } from '../../types/models.js';
import type { OutcomeRepository } from './types.js';

export class PgOutcomeStore implements OutcomeRepository {
  async insertMany(outcomes: DeliveryOutcome[]): Promise<number> {
    if (outcomes.length === 0) return 0;
    const result = await query(
      `INSERT INTO delivery_outcomes (
         caption_id, creator_id, sent_count, viewed_count, purchased_count, earnings, sent_at
       )
       SELECT * FROM unnest(
         $1::text[], $2::text[], $3::int[], $4::int[], $5::int[], $6::numeric[], $7::timestamptz[]
       )`,
      [
        outcomes.map((o) => o.caption_id),
        outcomes.map((o) => o.creator_id),
        outcomes.map((o) => o.sent_count),
        outcomes.map((o) => o.viewed_count),
        outcomes.map((o) => o.purchased_count),
        outcomes.map((o) => o.earnings),
        outcomes.map((o) => o.sent_at),
      ]
    );
    return result.rowCount ?? 0;
  }

  async listReceivedBetween(since: Date, until: Date): Promise<DeliveryOutcome[]> {
    const result = await query<DeliveryOutcome>(
      `SELECT caption_id, creator_id, sent_count, viewed_count, purchased_count,
              earnings::float8 AS earnings, sent_at, received_at
       FROM delivery_outcomes
       WHERE received_at >= $1 AND received_at < $2 AND viewed_count > 0
       ORDER BY sent_at ASC`,
      [since, until]
    );
    return result.rows;
  }

  async medianEmvByCreator(creatorIds: string[], since: Date): Promise<Map<string, number>> {
    if (creatorIds.length === 0) return new Map();
    const result = await query<{ creator_id: string; median_emv: number }>(
      `SELECT creator_id,
              percentile_cont(0.5) WITHIN GROUP (
                ORDER BY (purchased_count::float8 / viewed_count) * earnings::float8
              ) AS median_emv
       FROM delivery_outcomes
       WHERE creator_id = ANY($1::text[]) AND sent_at >= $2 AND viewed_count > 0
       GROUP BY creator_id`,
      [creatorIds, since]
    );
    return new Map(result.rows.map((row) => [row.creator_id, row.median_emv]));
  }
}
