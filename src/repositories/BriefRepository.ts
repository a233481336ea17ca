import { Database } from 'sqlite';
import { Brief, BriefRow } from '../types/models';
import { briefModelToRow, briefRowToModel } from '../models/transformers';

/**
 * BriefRepository stores one daily brief per user and date
 */
export class BriefRepository {
  constructor(private db: Database) {}

  /**
   * Insert the brief, or replace the contents of the existing brief for the
   * same user and date. The stored brief keeps its original ID and created_at.
   */
  async upsert(brief: Brief): Promise<Brief> {
    const row = briefModelToRow(brief);

    try {
      await this.db.run(
        `INSERT INTO briefs (
          brief_id, user_id, brief_date, total_items, high_priority_count,
          todo_count, followup_count, items, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(user_id, brief_date) DO UPDATE SET
          total_items = excluded.total_items,
          high_priority_count = excluded.high_priority_count,
          todo_count = excluded.todo_count,
          followup_count = excluded.followup_count,
          items = excluded.items,
          updated_at = excluded.updated_at`,
        [
          row.brief_id,
          row.user_id,
          row.brief_date,
          row.total_items,
          row.high_priority_count,
          row.todo_count,
          row.followup_count,
          row.items,
          row.created_at,
          row.updated_at
        ]
      );

      const stored = await this.getByUserAndDate(brief.userId, brief.briefDate);
      if (!stored) {
        throw new Error(`Brief for ${brief.userId} on ${brief.briefDate} was not stored`);
      }
      return stored;
    } catch (error) {
      console.error('❌ Failed to save brief:', error);
      throw error;
    }
  }

  /**
   * Get brief by ID
   */
  async getById(briefId: string): Promise<Brief | null> {
    try {
      const row = await this.db.get<BriefRow>('SELECT * FROM briefs WHERE brief_id = ?', [briefId]);
      return row ? briefRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get brief by ID:', error);
      throw error;
    }
  }

  async getByUserAndDate(userId: string, briefDate: string): Promise<Brief | null> {
    try {
      const row = await this.db.get<BriefRow>(
        'SELECT * FROM briefs WHERE user_id = ? AND brief_date = ?',
        [userId, briefDate]
      );
      return row ? briefRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get brief by user and date:', error);
      throw error;
    }
  }
}
