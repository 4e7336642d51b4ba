import { query, withTransaction } from '../../db/client.js';
import type { BanditStat } from '../../types/models.js';
import type { BanditStatRepository } from './types.js';

const STAT_COLUMNS = `caption_id, creator_id, successes, failures, total_observations, avg_emv,
  total_revenue, last_emv_observed, confidence_lower, confidence_upper, exploration_bonus,
  performance_percentile, last_updated`;

// Rows per upsert statement
const UPSERT_CHUNK = 1000;

export class PgBanditStatStore implements BanditStatRepository {
  async listForCreator(creatorId: string): Promise<BanditStat[]> {
    const result = await query<BanditStat>(
      `SELECT ${STAT_COLUMNS} FROM caption_bandit_stats WHERE creator_id = $1`,
      [creatorId]
    );
    return result.rows;
  }

  async listAll(): Promise<BanditStat[]> {
    const result = await query<BanditStat>(`SELECT ${STAT_COLUMNS} FROM caption_bandit_stats`);
    return result.rows;
  }

  async upsertMany(stats: BanditStat[]): Promise<number> {
    return withTransaction(async (client) => {
      let written = 0;
      for (let offset = 0; offset < stats.length; offset += UPSERT_CHUNK) {
        const chunk = stats.slice(offset, offset + UPSERT_CHUNK);
        const result = await client.query(
          `INSERT INTO caption_bandit_stats (${STAT_COLUMNS})
           SELECT * FROM unnest(
             $1::text[], $2::text[], $3::float8[], $4::float8[], $5::int[], $6::float8[],
             $7::float8[], $8::float8[], $9::float8[], $10::float8[], $11::float8[],
             $12::int[], $13::timestamptz[]
           )
           ON CONFLICT (caption_id, creator_id) DO UPDATE SET
             successes = EXCLUDED.successes,
             failures = EXCLUDED.failures,
             total_observations = EXCLUDED.total_observations,
             avg_emv = EXCLUDED.avg_emv,
             total_revenue = EXCLUDED.total_revenue,
             last_emv_observed = EXCLUDED.last_emv_observed,
             confidence_lower = EXCLUDED.confidence_lower,
             confidence_upper = EXCLUDED.confidence_upper,
             exploration_bonus = EXCLUDED.exploration_bonus,
             performance_percentile = EXCLUDED.performance_percentile,
             last_updated = EXCLUDED.last_updated`,
          [
            chunk.map((s) => s.caption_id),
            chunk.map((s) => s.creator_id),
            chunk.map((s) => s.successes),
            chunk.map((s) => s.failures),
            chunk.map((s) => s.total_observations),
            chunk.map((s) => s.avg_emv),
            chunk.map((s) => s.total_revenue),
            chunk.map((s) => s.last_emv_observed),
            chunk.map((s) => s.confidence_lower),
            chunk.map((s) => s.confidence_upper),
            chunk.map((s) => s.exploration_bonus),
            chunk.map((s) => s.performance_percentile),
            chunk.map((s) => s.last_updated),
          ]
        );
        written += result.rowCount ?? 0;
      }
      return written;
    });
  }
}
