import { query } from '../../db/client.js';
import type { RestrictionRepository } from './types.js';

export class PgRestrictionStore implements RestrictionRepository {
  async findForCreator(creatorId: string): Promise<Record<string, unknown> | null> {
    const result = await query<Record<string, unknown>>(
      `SELECT restricted_categories, restricted_price_tiers, hard_patterns, soft_patterns, is_active
       FROM creator_caption_restrictions
       WHERE creator_id = $1`,
      [creatorId]
    );
    return result.rows[0] ?? null;
  }
}
