import { Database } from 'sqlite';
import { TaskRepository } from '../../repositories/TaskRepository';
import { createTestDatabase } from '../helpers/fixtures';

describe('TaskRepository', () => {
  let db: Database;
  let repository: TaskRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new TaskRepository(db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should create a task with defaults', async () => {
    const task = await repository.create({ userId: 'user-1', title: 'Send report', priority: 6 });

    expect(task.status).toBe('open');
    expect(task.description).toBeNull();
    expect(task.dueDate).toBeNull();
    expect(task.sourceMessageId).toBeNull();
    expect(await repository.getById(task.taskId)).toEqual(task);
  });

  it('should batch create tasks', async () => {
    const tasks = await repository.batchCreate([
      { userId: 'user-1', title: 'First', priority: 3 },
      { userId: 'user-1', title: 'Second', priority: 8, dueDate: '2024-03-04' }
    ]);

    expect(tasks).toHaveLength(2);
    expect(await repository.count({ userId: 'user-1' })).toBe(2);
  });

  it('should roll back a batch when one insert fails', async () => {
    await expect(
      repository.batchCreate([
        { userId: 'user-1', title: 'Valid', priority: 3 },
        { userId: 'user-1', title: 'Invalid', priority: 42 }
      ])
    ).rejects.toThrow();

    expect(await repository.count()).toBe(0);
  });

  it('should run concurrent batches one transaction at a time', async () => {
    const [first, second] = await Promise.all([
      repository.batchCreate([
        { userId: 'user-1', title: 'First A', priority: 3 },
        { userId: 'user-1', title: 'First B', priority: 4 }
      ]),
      new TaskRepository(db).batchCreate([
        { userId: 'user-2', title: 'Second A', priority: 5 },
        { userId: 'user-2', title: 'Second B', priority: 6 }
      ])
    ]);

    expect(first).toHaveLength(2);
    expect(second).toHaveLength(2);
    expect(await repository.count()).toBe(4);
  });

  it('should keep accepting batches after a failed one', async () => {
    const results = await Promise.allSettled([
      repository.batchCreate([{ userId: 'user-1', title: 'Invalid', priority: 42 }]),
      repository.batchCreate([{ userId: 'user-1', title: 'Valid', priority: 3 }])
    ]);

    expect(results.map(result => result.status)).toEqual(['rejected', 'fulfilled']);
    expect(await repository.count()).toBe(1);
  });

  it('should list with filters, highest priority first', async () => {
    await repository.batchCreate([
      { userId: 'user-1', title: 'Low', priority: 2 },
      { userId: 'user-1', title: 'High', priority: 9 },
      { userId: 'user-1', title: 'Done', priority: 7, status: 'done' },
      { userId: 'user-2', title: 'Other user', priority: 10 }
    ]);

    const open = await repository.list({ userId: 'user-1', status: 'open' });
    expect(open.map(t => t.title)).toEqual(['High', 'Low']);

    const important = await repository.list({ minPriority: 7 });
    expect(important.map(t => t.title)).toEqual(['Other user', 'High', 'Done']);

    const page = await repository.list({ limit: 2, offset: 1 });
    expect(page.map(t => t.title)).toEqual(['High', 'Done']);
  });

  it('should update fields and refresh updated_at', async () => {
    const task = await repository.create({ userId: 'user-1', title: 'Send report', priority: 6 });

    const updated = await repository.update(task.taskId, { status: 'done', dueDate: '2024-03-08' });

    expect(updated?.status).toBe('done');
    expect(updated?.dueDate).toBe('2024-03-08');
    expect(updated?.title).toBe('Send report');
    expect(updated?.updatedAt.getTime()).toBeGreaterThanOrEqual(task.updatedAt.getTime());
  });

  it('should clear nullable fields when set to null', async () => {
    const task = await repository.create({
      userId: 'user-1',
      title: 'Send report',
      description: 'Details',
      priority: 6
    });

    const updated = await repository.update(task.taskId, { description: null });

    expect(updated?.description).toBeNull();
  });

  it('should return null when updating a missing task', async () => {
    expect(await repository.update('missing', { title: 'x' })).toBeNull();
  });

  it('should delete', async () => {
    const task = await repository.create({ userId: 'user-1', title: 'Send report', priority: 6 });

    expect(await repository.delete(task.taskId)).toBe(true);
    expect(await repository.getById(task.taskId)).toBeNull();
    expect(await repository.delete(task.taskId)).toBe(false);
  });

  it('should group task titles by source message for one user', async () => {
    await repository.batchCreate([
      { userId: 'user-1', title: 'Reply to Alice', priority: 5, sourceMessageId: 'msg-1' },
      { userId: 'user-1', title: 'Book room', priority: 5, sourceMessageId: 'msg-1' },
      { userId: 'user-1', title: 'Read notes', priority: 5, sourceMessageId: 'msg-2' },
      { userId: 'user-2', title: 'Not mine', priority: 5, sourceMessageId: 'msg-1' }
    ]);

    const titles = await repository.getTitlesByMessageIds('user-1', ['msg-1', 'msg-2', 'msg-3']);

    expect(titles.get('msg-1')?.sort()).toEqual(['Book room', 'Reply to Alice']);
    expect(titles.get('msg-2')).toEqual(['Read notes']);
    expect(titles.has('msg-3')).toBe(false);
  });
});
