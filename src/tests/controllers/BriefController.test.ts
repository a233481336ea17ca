import request from 'supertest';
import express from 'express';
import { Database } from 'sqlite';
import { createApp } from '../../index';
import { loadConfig } from '../../config';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import {
  buildClassification,
  buildMessage,
  createTestDatabase,
  jsonResponse,
  messagePayload,
  TEST_ENV
} from '../helpers/fixtures';

describe('BriefController', () => {
  let db: Database;
  let app: express.Express;

  const message = buildMessage({ sender: 'ceo@example.com' });

  beforeEach(async () => {
    db = await createTestDatabase();
    app = createApp(loadConfig(TEST_ENV), db);

    await new ClassificationRepository(db).insertIfAbsent(
      buildClassification({ msgId: message.msgId, priority: 9, createdAt: new Date('2024-03-01T10:00:00.000Z') })
    );
    jest.spyOn(global, 'fetch').mockImplementation(async () => jsonResponse(messagePayload(message)));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await db.close();
  });

  it('should generate a brief for a date', async () => {
    const response = await request(app).post('/briefs').send({ user_id: 'user-1', date: '2024-03-01' });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      user_id: 'user-1',
      brief_date: '2024-03-01',
      total_items: 1,
      high_priority_count: 1,
      todo_count: 1,
      followup_count: 0
    });
    expect(response.body.items[0]).toMatchObject({
      message_id: message.msgId,
      title: 'Quarterly report',
      priority_score: 9,
      sender: 'ceo@example.com',
      extracted_tasks: null
    });
  });

  it('should validate the request', async () => {
    const response = await request(app).post('/briefs').send({ user_id: 'user-1', max_items: 500 });

    expect(response.status).toBe(400);
    expect(response.body.details[0].field).toBe('max_items');
  });

  it('should fetch a stored brief by user and date, and by ID', async () => {
    const created = await request(app).post('/briefs').send({ user_id: 'user-1', date: '2024-03-01' });

    const byDate = await request(app).get('/briefs?user_id=user-1&date=2024-03-01');
    expect(byDate.status).toBe(200);
    expect(byDate.body.brief_id).toBe(created.body.brief_id);

    const byId = await request(app).get(`/briefs/${created.body.brief_id}`);
    expect(byId.status).toBe(200);
    expect(byId.body).toEqual(created.body);
  });

  it('should return 404 when no brief exists', async () => {
    const response = await request(app).get('/briefs?user_id=user-1&date=2024-01-01');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('Brief not found');
  });
});
