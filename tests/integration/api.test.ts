import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app';
import { Database } from '../../src/db/database';
import { MongoFocusStore } from '../../src/store/mongoFocusStore';
import { createTestApp, createTestConfig, type TestApp } from '../helpers/app';
import { createCaptureLogger } from '../helpers/captureLogger';

describe('Focus tracker API', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  async function startSession(body: Record<string, unknown> = {}): Promise<string> {
    const res = await request(ctx.app)
      .post('/api/session/start')
      .send({ user_id: 'user-1', goal: 'finish report', duration_minutes: 25, ...body });
    expect(res.status).toBe(200);
    return res.body.session_id;
  }

  describe('status endpoints', () => {
    it('GET / should answer with a message', async () => {
      const res = await request(ctx.app).get('/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Focus tracker backend running' });
    });

    it('GET /health should report ok', async () => {
      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(res.body.env).toBe('test');
    });

    it('GET /test should describe store connectivity', async () => {
      const res = await request(ctx.app).get('/test');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        backend: 'Running',
        database: 'Connected & Working',
        database_url: 'Not Set',
        database_name: 'Not Set',
        connection_status: 'Connected',
        collections: ['user', 'session', 'activityevent'],
      });
    });

    it('GET /test should report a failing store in the body', async () => {
      ctx.store.diagnose = async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:27017 while opening the pool');
      };

      const res = await request(ctx.app).get('/test');

      expect(res.status).toBe(200);
      expect(res.body.database).toBe('Error: connect ECONNREFUSED 127.0.0.1:27017 while opening');
      expect(res.body.connection_status).toBe('Not Connected');
    });

    it('should allow cross-origin requests from any origin', async () => {
      const res = await request(ctx.app).get('/').set('Origin', 'https://app.example.test');

      expect(res.headers['access-control-allow-origin']).toBe('*');
    });
  });

  describe('POST /api/user/register', () => {
    it('should create a user and return its id', async () => {
      const res = await request(ctx.app)
        .post('/api/user/register')
        .send({ name: 'Sam', device_id: 'device-1' });

      expect(res.status).toBe(200);
      expect(ctx.store.users.get(res.body.user_id)).toMatchObject({
        name: 'Sam',
        email: null,
        deviceId: 'device-1',
        voice: 'Cluely',
      });
    });

    it('should reject a request without device_id', async () => {
      const res = await request(ctx.app).post('/api/user/register').send({ name: 'Sam' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details).toEqual([{ field: 'device_id', message: 'Required' }]);
    });
  });

  describe('POST /api/session/start', () => {
    it('should start an active session', async () => {
      const res = await request(ctx.app)
        .post('/api/session/start')
        .send({ user_id: 'user-1', goal: 'finish report', duration_minutes: 25, categories: ['social'] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ session_id: expect.any(String), status: 'active' });
      expect(ctx.store.sessions.get(res.body.session_id)?.categories).toEqual(['social']);
    });

    it.each([1, 480])('should accept duration_minutes=%i', async (duration) => {
      const res = await request(ctx.app)
        .post('/api/session/start')
        .send({ user_id: 'user-1', goal: 'g', duration_minutes: duration });

      expect(res.status).toBe(200);
    });

    it('should accept a duration sent as a whole-number string', async () => {
      const res = await request(ctx.app)
        .post('/api/session/start')
        .send({ user_id: 'user-1', goal: 'g', duration_minutes: '45' });

      expect(res.status).toBe(200);
      expect(ctx.store.sessions.get(res.body.session_id)?.durationMinutes).toBe(45);
    });

    it.each([
      [0, 'duration_minutes must be at least 1'],
      [481, 'duration_minutes must be at most 480'],
    ])('should reject duration_minutes=%i', async (duration, message) => {
      const res = await request(ctx.app)
        .post('/api/session/start')
        .send({ user_id: 'user-1', goal: 'g', duration_minutes: duration });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: [{ field: 'duration_minutes', message }],
        },
      });
    });
  });

  describe('POST /api/session/activity', () => {
    it('should return the classification', async () => {
      const sessionId = await startSession({ categories: ['social'] });

      const res = await request(ctx.app)
        .post('/api/session/activity')
        .send({ session_id: sessionId, user_id: 'user-1', title: 'Twitter feed' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        decision: 'irrelevant',
        reason: "Matched blocked keyword 'twitter' in category 'social'",
      });
    });

    it('should answer 404 for an unknown session', async () => {
      const res = await request(ctx.app)
        .post('/api/session/activity')
        .send({ session_id: 'not-a-session', user_id: 'user-1' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Session not found' } });
    });

    it('should count concurrent reports for one session', async () => {
      const sessionId = await startSession({ goal: 'abc' });

      await Promise.all(
        Array.from({ length: 5 }, () =>
          request(ctx.app)
            .post('/api/session/activity')
            .send({ session_id: sessionId, user_id: 'user-1', title: 'Notes' })
        )
      );

      expect(ctx.store.sessions.get(sessionId)?.totalFocusSeconds).toBe(150);
      expect(ctx.store.events).toHaveLength(5);
    });
  });

  describe('POST /api/session/end', () => {
    it('should end the session', async () => {
      const sessionId = await startSession();

      const res = await request(ctx.app).post('/api/session/end').send({ session_id: sessionId });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ended' });
      expect(ctx.store.sessions.get(sessionId)?.status).toBe('ended');
    });

    it('should answer 404 for an unknown session', async () => {
      const res = await request(ctx.app).post('/api/session/end').send({ session_id: 'missing' });

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Session not found');
    });
  });

  describe('GET /api/session/:user_id/summary', () => {
    it('should sum the user sessions', async () => {
      ctx.store.seedSession({ userId: 'user-7', status: 'ended', totalFocusSeconds: 60, distractionsBlocked: 1 });
      ctx.store.seedSession({ userId: 'user-7', status: 'ended', totalFocusSeconds: 90, distractionsBlocked: 2 });

      const res = await request(ctx.app).get('/api/session/user-7/summary');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        sessions: 2,
        total_focus_seconds: 150,
        total_idle_seconds: 0,
        distractions_blocked: 3,
        streak_days: 2,
      });
    });
  });

  describe('session walkthrough', () => {
    it('should track distractions through to the end of a session', async () => {
      const startRes = await request(ctx.app)
        .post('/api/session/start')
        .send({ user_id: 'user-1', goal: 'finish report', duration_minutes: 25, categories: ['social'] });
      expect(startRes.body.status).toBe('active');
      const sessionId: string = startRes.body.session_id;

      for (let i = 0; i < 3; i++) {
        const res = await request(ctx.app)
          .post('/api/session/activity')
          .send({ session_id: sessionId, user_id: 'user-1', url: 'https://reddit.com/r/all' });
        expect(res.body.decision).toBe('irrelevant');
      }

      const summary = await request(ctx.app).get('/api/session/user-1/summary');
      expect(summary.body).toMatchObject({
        sessions: 1,
        distractions_blocked: 3,
        total_focus_seconds: 0,
      });

      const endRes = await request(ctx.app).post('/api/session/end').send({ session_id: sessionId });
      expect(endRes.body).toEqual({ status: 'ended' });

      const late = await request(ctx.app)
        .post('/api/session/activity')
        .send({ session_id: sessionId, user_id: 'user-1', url: 'https://reddit.com/r/all' });
      expect(late.status).toBe(200);
      expect(ctx.store.sessions.get(sessionId)?.distractionsBlocked).toBe(4);
    });

    it('should reject activity after the end when configured to', async () => {
      ctx = createTestApp({ rejectEndedSessionActivity: true });
      const sessionId = await startSession();
      await request(ctx.app).post('/api/session/end').send({ session_id: sessionId });

      const res = await request(ctx.app)
        .post('/api/session/activity')
        .send({ session_id: sessionId, user_id: 'user-1' });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: { code: 'SESSION_ENDED', message: 'Session has ended' } });
    });
  });

  describe('error responses', () => {
    it('should reject malformed JSON', async () => {
      const res = await request(ctx.app)
        .post('/api/session/start')
        .set('Content-Type', 'application/json')
        .send('{"user_id": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'INVALID_JSON', message: 'Malformed JSON body' } });
    });

    it('should answer 404 for unknown routes', async () => {
      const res = await request(ctx.app).get('/api/nothing-here');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('should answer 503 when no database is configured', async () => {
      const app = createApp({
        config: createTestConfig(),
        store: new MongoFocusStore(new Database({})),
      });

      const res = await request(app)
        .post('/api/session/activity')
        .send({ session_id: '65f1c2a9e4b0a1b2c3d4e5f6', user_id: 'user-1' });

      expect(res.status).toBe(503);
      expect(res.body).toEqual({
        error: { code: 'STORE_UNAVAILABLE', message: 'Database is not available' },
      });

      const diagnostics = await request(app).get('/test');
      expect(diagnostics.body).toMatchObject({
        database: 'Not Available',
        connection_status: 'Not Connected',
        collections: [],
      });
    });

    it('should log failures on the logger the app was built with', async () => {
      const { log, lines } = createCaptureLogger();
      const store = new MongoFocusStore(new Database({}));
      store.listSessionsByUser = async () => {
        throw new Error('socket hang up');
      };
      const app = createApp({ config: createTestConfig(), store, log });

      await request(app).get('/api/session/user-1/summary');

      const failure = lines.find((line) => line.level === 50);
      expect(failure).toMatchObject({ msg: 'Error: socket hang up', method: 'GET' });
    });

    it('should hide internal error details outside development and test', async () => {
      ctx = createTestApp({ env: 'production' });
      ctx.store.listSessionsByUser = async () => {
        throw new Error('socket hang up');
      };

      const res = await request(ctx.app).get('/api/session/user-1/summary');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        error: { code: 'INTERNAL_ERROR', message: 'An internal error occurred' },
      });
    });
  });
});
