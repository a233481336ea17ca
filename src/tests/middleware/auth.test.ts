import request from 'supertest';
import express from 'express';
import jwt from 'jsonwebtoken';
import { AuthenticatedRequest, authenticateToken, optionalAuth, userFromPayload } from '../../middleware/auth';

describe('auth middleware', () => {
  const JWT_SECRET = 'test-secret';

  function buildApp(middleware: express.RequestHandler): express.Express {
    const app = express();
    app.use(middleware);
    app.get('/whoami', (req: AuthenticatedRequest, res) => {
      res.json({ user: req.user ?? null });
    });
    return app;
  }

  describe('userFromPayload', () => {
    it('should prefer user_id, then id, then sub', () => {
      expect(userFromPayload({ user_id: 'a', id: 'b', sub: 'c' }, 't')?.id).toBe('a');
      expect(userFromPayload({ id: 'b', sub: 'c' }, 't')?.id).toBe('b');
      expect(userFromPayload({ sub: 'c' }, 't')?.id).toBe('c');
    });

    it('should stringify numeric ids', () => {
      expect(userFromPayload({ id: 42 }, 't')).toEqual({ id: '42', email: undefined, token: 't' });
    });

    it('should return null without an id claim', () => {
      expect(userFromPayload({ email: 'someone@example.com' }, 't')).toBeNull();
      expect(userFromPayload('plain-string', 't')).toBeNull();
    });
  });

  describe('authenticateToken', () => {
    const app = buildApp(authenticateToken(JWT_SECRET));

    it('should attach the user for a valid token', async () => {
      const token = jwt.sign({ user_id: 'user-1', email: 'someone@example.com' }, JWT_SECRET);

      const response = await request(app).get('/whoami').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.user).toEqual({ id: 'user-1', email: 'someone@example.com', token });
    });

    it('should return 401 without a token', async () => {
      const response = await request(app).get('/whoami');

      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Access token required');
    });

    it('should return 401 when the token carries no user id', async () => {
      const token = jwt.sign({ email: 'someone@example.com' }, JWT_SECRET);

      const response = await request(app).get('/whoami').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('User ID not found in token');
    });

    it('should return 401 for an expired token', async () => {
      const token = jwt.sign({ sub: 'user-1', exp: Math.floor(Date.now() / 1000) - 60 }, JWT_SECRET);

      const response = await request(app).get('/whoami').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Token expired');
    });

    it('should return 403 for a token signed with another secret', async () => {
      const token = jwt.sign({ sub: 'user-1' }, 'other-secret');

      const response = await request(app).get('/whoami').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(403);
      expect(response.body.error).toBe('Invalid token');
    });
  });

  describe('optionalAuth', () => {
    const app = buildApp(optionalAuth(JWT_SECRET));

    it('should continue anonymously without a token', async () => {
      const response = await request(app).get('/whoami');

      expect(response.status).toBe(200);
      expect(response.body.user).toBeNull();
    });

    it('should continue anonymously with an invalid token', async () => {
      const response = await request(app).get('/whoami').set('Authorization', 'Bearer not-a-token');

      expect(response.status).toBe(200);
      expect(response.body.user).toBeNull();
    });

    it('should attach the user for a valid token', async () => {
      const token = jwt.sign({ sub: 'user-2' }, JWT_SECRET);

      const response = await request(app).get('/whoami').set('Authorization', `Bearer ${token}`);

      expect(response.body.user.id).toBe('user-2');
    });
  });
});
