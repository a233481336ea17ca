import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { runMigrations } from '../../database/migrations';
import { Classification, Message } from '../../types/models';

/**
 * Fresh in-memory database with the full schema
 */
export async function createTestDatabase(): Promise<Database> {
  const db = await open({
    filename: ':memory:',
    driver: sqlite3.Database
  });
  await db.exec('PRAGMA foreign_keys = ON;');
  await runMigrations(db);
  return db;
}

export function buildMessage(overrides: Partial<Message> = {}): Message {
  return {
    msgId: '11111111-1111-4111-8111-111111111111',
    accountId: 'account-1',
    externalId: 'ext-1',
    channel: 'gmail',
    sender: 'alice@example.com',
    subject: 'Quarterly report',
    snippet: 'Can you send the quarterly report? Please include the appendix.',
    receivedAt: new Date('2024-03-01T09:15:00.000Z'),
    rawRef: null,
    priority: null,
    createdAt: new Date('2024-03-01T09:16:00.000Z'),
    ...overrides
  };
}

export function buildClassification(overrides: Partial<Classification> = {}): Classification {
  return {
    clsId: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa',
    msgId: '11111111-1111-4111-8111-111111111111',
    userId: 'user-1',
    label: 'todo',
    priority: 6,
    createdAt: new Date('2024-03-01T10:00:00.000Z'),
    ...overrides
  };
}

/**
 * Message payload as the integrations service serves it
 */
export function messagePayload(message: Message): Record<string, unknown> {
  return {
    msg_id: message.msgId,
    account_id: message.accountId,
    external_id: message.externalId,
    channel: message.channel,
    sender: message.sender,
    subject: message.subject,
    snippet: message.snippet,
    received_at: message.receivedAt.toISOString(),
    raw_ref: message.rawRef,
    priority: message.priority,
    created_at: message.createdAt.toISOString()
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export const TEST_ENV = {
  DATABASE_PATH: ':memory:',
  EVENTS_ENABLED: 'false',
  INTEGRATIONS_SERVICE_URL: 'http://integrations.test',
  JWT_SECRET: 'test-secret'
};
