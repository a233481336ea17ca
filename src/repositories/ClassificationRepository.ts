import { Database } from 'sqlite';
import {
  Classification,
  ClassificationFilters,
  ClassificationListOptions,
  ClassificationRow,
  ClassificationStats,
  ClassificationUpdate
} from '../types/models';
import { classificationModelToRow, classificationRowToModel } from '../models/transformers';

type SqlParam = string | number | null;

export interface InsertResult {
  classification: Classification;
  created: boolean;
}

/**
 * ClassificationRepository handles persistence and filtering of message
 * classifications in SQLite
 */
export class ClassificationRepository {
  constructor(private db: Database) {}

  private buildWhere(filters: ClassificationFilters): { clause: string; params: SqlParam[] } {
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    if (filters.label) {
      conditions.push('label = ?');
      params.push(filters.label);
    }

    if (filters.userId) {
      conditions.push('user_id = ?');
      params.push(filters.userId);
    }

    if (filters.msgId) {
      conditions.push('msg_id = ?');
      params.push(filters.msgId);
    }

    if (filters.minPriority !== undefined) {
      conditions.push('priority >= ?');
      params.push(filters.minPriority);
    }

    if (filters.maxPriority !== undefined) {
      conditions.push('priority <= ?');
      params.push(filters.maxPriority);
    }

    if (filters.createdAfter) {
      conditions.push('created_at >= ?');
      params.push(filters.createdAfter.toISOString());
    }

    if (filters.createdBefore) {
      conditions.push('created_at <= ?');
      params.push(filters.createdBefore.toISOString());
    }

    return {
      clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      params
    };
  }

  /**
   * Insert a classification unless one already exists for the message.
   * Returns whichever row is stored for the message afterwards.
   */
  async insertIfAbsent(classification: Classification): Promise<InsertResult> {
    const row = classificationModelToRow(classification);

    try {
      const result = await this.db.run(
        `INSERT INTO classifications (cls_id, msg_id, user_id, label, priority, created_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(msg_id) DO NOTHING`,
        [row.cls_id, row.msg_id, row.user_id, row.label, row.priority, row.created_at]
      );

      if (result.changes) {
        return { classification, created: true };
      }

      const existing = await this.getByMessageId(classification.msgId);
      if (!existing) {
        throw new Error(`Classification for message ${classification.msgId} vanished after conflict`);
      }
      return { classification: existing, created: false };
    } catch (error) {
      console.error('❌ Failed to create classification:', error);
      throw error;
    }
  }

  /**
   * Get classification by ID
   */
  async getById(clsId: string): Promise<Classification | null> {
    try {
      const row = await this.db.get<ClassificationRow>('SELECT * FROM classifications WHERE cls_id = ?', [clsId]);
      return row ? classificationRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get classification by ID:', error);
      throw error;
    }
  }

  /**
   * Get classification for a message
   */
  async getByMessageId(msgId: string): Promise<Classification | null> {
    try {
      const row = await this.db.get<ClassificationRow>('SELECT * FROM classifications WHERE msg_id = ?', [msgId]);
      return row ? classificationRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get classification by message ID:', error);
      throw error;
    }
  }

  /**
   * Get existing classifications for a set of messages (the dedup lookup)
   */
  async getByMessageIds(msgIds: string[]): Promise<Classification[]> {
    if (msgIds.length === 0) return [];

    const placeholders = msgIds.map(() => '?').join(',');
    try {
      const rows = await this.db.all<ClassificationRow[]>(
        `SELECT * FROM classifications WHERE msg_id IN (${placeholders})`,
        msgIds
      );
      return rows.map(classificationRowToModel);
    } catch (error) {
      console.error('❌ Failed to get classifications by message IDs:', error);
      throw error;
    }
  }

  /**
   * Get classifications by IDs
   */
  async getByIds(clsIds: string[]): Promise<Classification[]> {
    if (clsIds.length === 0) return [];

    const placeholders = clsIds.map(() => '?').join(',');
    try {
      const rows = await this.db.all<ClassificationRow[]>(
        `SELECT * FROM classifications WHERE cls_id IN (${placeholders})`,
        clsIds
      );
      return rows.map(classificationRowToModel);
    } catch (error) {
      console.error('❌ Failed to get classifications by IDs:', error);
      throw error;
    }
  }

  /**
   * List classifications with filtering and pagination
   */
  async list(options: ClassificationListOptions = {}): Promise<Classification[]> {
    const { clause, params } = this.buildWhere(options);
    let query = `SELECT * FROM classifications${clause}`;

    query += options.sort === 'priority'
      ? ' ORDER BY priority DESC, created_at DESC'
      : ' ORDER BY created_at DESC, priority DESC';

    query += ' LIMIT ? OFFSET ?';
    params.push(options.limit ?? 50, options.offset ?? 0);

    try {
      const rows = await this.db.all<ClassificationRow[]>(query, params);
      return rows.map(classificationRowToModel);
    } catch (error) {
      console.error('❌ Failed to list classifications:', error);
      throw error;
    }
  }

  /**
   * Count classifications matching the same filters as list
   */
  async count(filters: ClassificationFilters = {}): Promise<number> {
    const { clause, params } = this.buildWhere(filters);

    try {
      const row = await this.db.get<{ count: number }>(
        `SELECT COUNT(*) as count FROM classifications${clause}`,
        params
      );
      return row?.count || 0;
    } catch (error) {
      console.error('❌ Failed to count classifications:', error);
      throw error;
    }
  }

  /**
   * Non-noise classifications for a user created within [from, to),
   * highest priority first
   */
  async getActionableForUser(userId: string, from: Date, to: Date, limit: number): Promise<Classification[]> {
    try {
      const rows = await this.db.all<ClassificationRow[]>(
        `SELECT * FROM classifications
         WHERE user_id = ? AND label != 'noise' AND created_at >= ? AND created_at < ?
         ORDER BY priority DESC, created_at DESC
         LIMIT ?`,
        [userId, from.toISOString(), to.toISOString(), limit]
      );
      return rows.map(classificationRowToModel);
    } catch (error) {
      console.error('❌ Failed to get actionable classifications:', error);
      throw error;
    }
  }

  /**
   * Update label and/or priority
   */
  async update(clsId: string, update: ClassificationUpdate): Promise<Classification | null> {
    const assignments: string[] = [];
    const params: SqlParam[] = [];

    if (update.label !== undefined) {
      assignments.push('label = ?');
      params.push(update.label);
    }
    if (update.priority !== undefined) {
      assignments.push('priority = ?');
      params.push(update.priority);
    }
    if (assignments.length === 0) {
      return this.getById(clsId);
    }

    try {
      const result = await this.db.run(
        `UPDATE classifications SET ${assignments.join(', ')} WHERE cls_id = ?`,
        [...params, clsId]
      );
      if (!result.changes) {
        return null;
      }
      return this.getById(clsId);
    } catch (error) {
      console.error('❌ Failed to update classification:', error);
      throw error;
    }
  }

  /**
   * Delete classification by ID
   */
  async delete(clsId: string): Promise<boolean> {
    try {
      const result = await this.db.run('DELETE FROM classifications WHERE cls_id = ?', [clsId]);
      return Boolean(result.changes);
    } catch (error) {
      console.error('❌ Failed to delete classification:', error);
      throw error;
    }
  }

  /**
   * Per-label counts and average priority, optionally for one user
   */
  async getStats(userId?: string): Promise<ClassificationStats> {
    const { clause, params } = this.buildWhere({ userId });

    try {
      const rows = await this.db.all<Array<{ label: string; count: number; priority_sum: number }>>(
        `SELECT label, COUNT(*) as count, SUM(priority) as priority_sum
         FROM classifications${clause}
         GROUP BY label`,
        params
      );

      const stats: ClassificationStats = {
        total: 0,
        byLabel: { todo: 0, followup: 0, noise: 0 },
        averagePriority: null
      };
      let prioritySum = 0;

      for (const row of rows) {
        if (row.label === 'todo' || row.label === 'followup' || row.label === 'noise') {
          stats.byLabel[row.label] = row.count;
        }
        stats.total += row.count;
        prioritySum += row.priority_sum;
      }

      if (stats.total > 0) {
        stats.averagePriority = Math.round((prioritySum / stats.total) * 100) / 100;
      }

      return stats;
    } catch (error) {
      console.error('❌ Failed to get classification stats:', error);
      throw error;
    }
  }
}
