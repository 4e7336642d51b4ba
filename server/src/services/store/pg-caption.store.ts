import { query } from '../../db/client.js';
import type { Caption } from '../../types/models.js';
import type { CaptionStore } from './types.js';

const CAPTION_COLUMNS = `caption_id, caption_text, price_tier, content_category, trigger_tag, is_active, restricted_creators`;

export class PgCaptionStore implements CaptionStore {
  async listCaptions(): Promise<Caption[]> {
    const result = await query<Caption>(`SELECT ${CAPTION_COLUMNS} FROM captions ORDER BY caption_id`);
    return result.rows;
  }

  async getByIds(captionIds: string[]): Promise<Caption[]> {
    if (captionIds.length === 0) return [];
    const result = await query<Caption>(
      `SELECT ${CAPTION_COLUMNS} FROM captions WHERE caption_id = ANY($1::text[])`,
      [captionIds]
    );
    return result.rows;
  }
}
