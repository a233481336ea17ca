import request from 'supertest';
import express from 'express';
import { Database } from 'sqlite';
import { createApp } from '../../index';
import { loadConfig } from '../../config';
import { getHostAddress, SERVICE_NAME, SERVICE_VERSION } from '../../controllers/HealthController';
import { createTestDatabase, TEST_ENV } from '../helpers/fixtures';

describe('HealthController', () => {
  let db: Database;
  let app: express.Express;

  beforeEach(async () => {
    db = await createTestDatabase();
    app = createApp(loadConfig(TEST_ENV), db);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should describe the service at the root', async () => {
    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      resources: ['/health', '/classifications', '/tasks', '/briefs']
    });
  });

  it('should report health with the query echo', async () => {
    const response = await request(app).get('/health?echo=hello');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 200,
      status_message: 'OK',
      echo: 'hello',
      path_echo: null,
      checks: {
        database: 'ok',
        classifier_mode: 'keyword',
        events: 'disabled'
      }
    });
    expect(typeof response.body.timestamp).toBe('string');
    expect(response.body.ip_address).toBe(getHostAddress());
  });

  it('should echo the path segment', async () => {
    const response = await request(app).get('/health/ping');

    expect(response.body.path_echo).toBe('ping');
    expect(response.body.echo).toBeNull();
  });

  it('should report an unavailable database', async () => {
    await db.close();

    const response = await request(app).get('/health');

    expect(response.body.checks.database).toBe('unavailable');
    db = await createTestDatabase();
  });

  it('should return 404 with the route list for unknown routes', async () => {
    const response = await request(app).get('/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('Not Found');
    expect(response.body.message).toBe('Route GET /nothing-here not found');
  });

  describe('getHostAddress', () => {
    it('should pick the first external IPv4 address', () => {
      const address = getHostAddress({
        lo: [
          { address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }
        ],
        eth0: [
          { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '02:42:ac:11:00:02', internal: false, cidr: 'fe80::1/64', scopeid: 1 },
          { address: '10.0.0.5', netmask: '255.255.255.0', family: 'IPv4', mac: '02:42:ac:11:00:02', internal: false, cidr: '10.0.0.5/24' }
        ]
      });

      expect(address).toBe('10.0.0.5');
    });

    it('should fall back to loopback without external interfaces', () => {
      expect(getHostAddress({})).toBe('127.0.0.1');
    });
  });
});
