import { Database } from 'sqlite';
import { v4 as uuidv4 } from 'uuid';
import { Task, TaskCreate, TaskListOptions, TaskRow, TaskUpdate } from '../types/models';
import { taskModelToRow, taskRowToModel } from '../models/transformers';

type SqlParam = string | number | null;

// SQLite allows one open transaction per connection
const transactionQueues = new WeakMap<Database, Promise<void>>();

/**
 * TaskRepository handles CRUD operations for tasks
 */
export class TaskRepository {
  constructor(private db: Database) {}

  private buildTask(input: TaskCreate, now: Date): Task {
    return {
      taskId: uuidv4(),
      userId: input.userId,
      sourceMessageId: input.sourceMessageId ?? null,
      sourceClassificationId: input.sourceClassificationId ?? null,
      title: input.title,
      description: input.description ?? null,
      status: input.status ?? 'open',
      dueDate: input.dueDate ?? null,
      priority: input.priority,
      createdAt: now,
      updatedAt: now
    };
  }

  private async insert(task: Task): Promise<void> {
    const row = taskModelToRow(task);
    await this.db.run(
      `INSERT INTO tasks (
        task_id, user_id, source_message_id, source_classification_id, title,
        description, status, due_date, priority, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.task_id,
        row.user_id,
        row.source_message_id,
        row.source_classification_id,
        row.title,
        row.description,
        row.status,
        row.due_date,
        row.priority,
        row.created_at,
        row.updated_at
      ]
    );
  }

  private runExclusive<T>(work: () => Promise<T>): Promise<T> {
    const previous = transactionQueues.get(this.db) ?? Promise.resolve();
    const result = previous.then(work);
    // The caller receives the error through result; the queue only waits for completion
    transactionQueues.set(this.db, result.then(() => undefined, () => undefined));
    return result;
  }

  /**
   * Create a new task
   */
  async create(input: TaskCreate): Promise<Task> {
    const task = this.buildTask(input, new Date());

    try {
      await this.insert(task);
      return task;
    } catch (error) {
      console.error('❌ Failed to create task:', error);
      throw error;
    }
  }

  /**
   * Create multiple tasks in a single transaction
   */
  async batchCreate(inputs: TaskCreate[]): Promise<Task[]> {
    if (inputs.length === 0) return [];

    const now = new Date();
    const tasks = inputs.map(input => this.buildTask(input, now));

    return this.runExclusive(async () => {
      try {
        await this.db.exec('BEGIN TRANSACTION');

        for (const task of tasks) {
          await this.insert(task);
        }

        await this.db.exec('COMMIT');
        return tasks;
      } catch (error) {
        await this.db.exec('ROLLBACK');
        console.error('❌ Failed to batch create tasks:', error);
        throw error;
      }
    });
  }

  /**
   * Get task by ID
   */
  async getById(taskId: string): Promise<Task | null> {
    try {
      const row = await this.db.get<TaskRow>('SELECT * FROM tasks WHERE task_id = ?', [taskId]);
      return row ? taskRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get task by ID:', error);
      throw error;
    }
  }

  private buildWhere(options: TaskListOptions): { clause: string; params: SqlParam[] } {
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    if (options.userId) {
      conditions.push('user_id = ?');
      params.push(options.userId);
    }

    if (options.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }

    if (options.minPriority !== undefined) {
      conditions.push('priority >= ?');
      params.push(options.minPriority);
    }

    return {
      clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      params
    };
  }

  /**
   * List tasks, highest priority first
   */
  async list(options: TaskListOptions = {}): Promise<Task[]> {
    const { clause, params } = this.buildWhere(options);
    const query = `SELECT * FROM tasks${clause} ORDER BY priority DESC, created_at DESC LIMIT ? OFFSET ?`;
    params.push(options.limit ?? 50, options.offset ?? 0);

    try {
      const rows = await this.db.all<TaskRow[]>(query, params);
      return rows.map(taskRowToModel);
    } catch (error) {
      console.error('❌ Failed to list tasks:', error);
      throw error;
    }
  }

  /**
   * Count tasks matching the list filters
   */
  async count(options: TaskListOptions = {}): Promise<number> {
    const { clause, params } = this.buildWhere(options);

    try {
      const row = await this.db.get<{ count: number }>(`SELECT COUNT(*) as count FROM tasks${clause}`, params);
      return row?.count || 0;
    } catch (error) {
      console.error('❌ Failed to count tasks:', error);
      throw error;
    }
  }

  /**
   * Update task fields; updated_at is always refreshed
   */
  async update(taskId: string, update: TaskUpdate): Promise<Task | null> {
    const assignments: string[] = [];
    const params: SqlParam[] = [];

    if (update.title !== undefined) {
      assignments.push('title = ?');
      params.push(update.title);
    }
    if (update.description !== undefined) {
      assignments.push('description = ?');
      params.push(update.description);
    }
    if (update.status !== undefined) {
      assignments.push('status = ?');
      params.push(update.status);
    }
    if (update.priority !== undefined) {
      assignments.push('priority = ?');
      params.push(update.priority);
    }
    if (update.dueDate !== undefined) {
      assignments.push('due_date = ?');
      params.push(update.dueDate);
    }

    assignments.push('updated_at = ?');
    params.push(new Date().toISOString());

    try {
      const result = await this.db.run(
        `UPDATE tasks SET ${assignments.join(', ')} WHERE task_id = ?`,
        [...params, taskId]
      );
      if (!result.changes) {
        return null;
      }
      return this.getById(taskId);
    } catch (error) {
      console.error('❌ Failed to update task:', error);
      throw error;
    }
  }

  /**
   * Delete task by ID
   */
  async delete(taskId: string): Promise<boolean> {
    try {
      const result = await this.db.run('DELETE FROM tasks WHERE task_id = ?', [taskId]);
      return Boolean(result.changes);
    } catch (error) {
      console.error('❌ Failed to delete task:', error);
      throw error;
    }
  }

  /**
   * Titles of a user's tasks grouped by source message
   */
  async getTitlesByMessageIds(userId: string, messageIds: string[]): Promise<Map<string, string[]>> {
    const titles = new Map<string, string[]>();
    if (messageIds.length === 0) return titles;

    const placeholders = messageIds.map(() => '?').join(',');
    try {
      const rows = await this.db.all<Array<{ source_message_id: string; title: string }>>(
        `SELECT source_message_id, title FROM tasks
         WHERE user_id = ? AND source_message_id IN (${placeholders})
         ORDER BY created_at ASC`,
        [userId, ...messageIds]
      );

      for (const row of rows) {
        const existing = titles.get(row.source_message_id);
        if (existing) {
          existing.push(row.title);
        } else {
          titles.set(row.source_message_id, [row.title]);
        }
      }
      return titles;
    } catch (error) {
      console.error('❌ Failed to get task titles by message IDs:', error);
      throw error;
    }
  }
}
