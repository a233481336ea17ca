import request from 'supertest';
import express from 'express';
import { Database } from 'sqlite';
import { createApp } from '../../index';
import { loadConfig } from '../../config';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { TaskRepository } from '../../repositories/TaskRepository';
import {
  buildClassification,
  buildMessage,
  createTestDatabase,
  jsonResponse,
  messagePayload,
  TEST_ENV
} from '../helpers/fixtures';

describe('TaskController', () => {
  let db: Database;
  let app: express.Express;
  let taskRepository: TaskRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    app = createApp(loadConfig(TEST_ENV), db);
    taskRepository = new TaskRepository(db);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await db.close();
  });

  describe('POST /tasks/generate', () => {
    it('should generate tasks from classifications', async () => {
      const message = buildMessage();
      const classification = buildClassification({ clsId: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa', msgId: message.msgId });
      await new ClassificationRepository(db).insertIfAbsent(classification);
      jest.spyOn(global, 'fetch').mockImplementation(async () => jsonResponse(messagePayload(message)));

      const response = await request(app)
        .post('/tasks/generate')
        .send({ classification_ids: [classification.clsId], user_id: 'user-1' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({ total_generated: 1, success_count: 1, error_count: 0 });
      expect(response.body.tasks[0]).toMatchObject({
        user_id: 'user-1',
        source_message_id: message.msgId,
        source_classification_id: classification.clsId,
        title: 'Quarterly report',
        status: 'open',
        priority: 6
      });
    });

    it('should require classification_ids and user_id', async () => {
      const response = await request(app).post('/tasks/generate').send({ classification_ids: [] });

      expect(response.status).toBe(400);
      expect(response.body.details.map((d: { field: string }) => d.field)).toEqual(['classification_ids', 'user_id']);
    });
  });

  describe('CRUD', () => {
    it('should create a task', async () => {
      const response = await request(app)
        .post('/tasks')
        .send({ user_id: 'user-1', title: 'Book flights', priority: 4, due_date: '2024-03-10' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        user_id: 'user-1',
        title: 'Book flights',
        status: 'open',
        due_date: '2024-03-10',
        priority: 4,
        description: null,
        source_message_id: null
      });
    });

    it('should link a task to an existing classification', async () => {
      const classification = buildClassification({ clsId: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa' });
      await new ClassificationRepository(db).insertIfAbsent(classification);

      const response = await request(app).post('/tasks').send({
        user_id: 'user-1',
        title: 'Send the report',
        priority: 6,
        source_classification_id: classification.clsId
      });

      expect(response.status).toBe(201);
      expect(response.body.source_classification_id).toBe(classification.clsId);
    });

    it('should return 404 when the source classification does not exist', async () => {
      const response = await request(app).post('/tasks').send({
        user_id: 'user-1',
        title: 'Orphan',
        priority: 5,
        source_classification_id: '99999999-9999-4999-8999-999999999999'
      });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'Classification not found',
        message: 'Classification 99999999-9999-4999-8999-999999999999 not found'
      });
      expect(await taskRepository.count()).toBe(0);
    });

    it('should reject invalid tasks', async () => {
      const response = await request(app).post('/tasks').send({ user_id: 'user-1', title: 'No priority' });

      expect(response.status).toBe(400);
    });

    it('should list tasks with filters', async () => {
      await taskRepository.batchCreate([
        { userId: 'user-1', title: 'Open', priority: 5 },
        { userId: 'user-1', title: 'Done', priority: 6, status: 'done' },
        { userId: 'user-2', title: 'Other', priority: 7 }
      ]);

      const response = await request(app).get('/tasks?user_id=user-1&status=open');

      expect(response.status).toBe(200);
      expect(response.body.tasks.map((t: { title: string }) => t.title)).toEqual(['Open']);
      expect(response.body.pagination).toEqual({ limit: 50, offset: 0, total: 1 });
    });

    it('should get, update and delete a task', async () => {
      const task = await taskRepository.create({ userId: 'user-1', title: 'Book flights', priority: 4 });

      const fetched = await request(app).get(`/tasks/${task.taskId}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body.task_id).toBe(task.taskId);

      const updated = await request(app).patch(`/tasks/${task.taskId}`).send({ status: 'done' });
      expect(updated.status).toBe(200);
      expect(updated.body.status).toBe('done');

      const deleted = await request(app).delete(`/tasks/${task.taskId}`);
      expect(deleted.status).toBe(200);

      const missing = await request(app).get(`/tasks/${task.taskId}`);
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe('Task not found');
    });

    it('should return 404 when updating unknown tasks', async () => {
      const response = await request(app).patch('/tasks/unknown').send({ title: 'New title' });

      expect(response.status).toBe(404);
    });
  });
});
