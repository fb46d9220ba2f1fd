import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { resolveSettings } from '../../src/config/settings.js';
import { SESSION_HEADER, createSqlRouter } from '../../src/http/sql-router.js';
import { SessionStore } from '../../src/session/session-store.js';
import { signSqlQuery } from '../../src/utils/signing.js';
import { FakeExecutor, resultOf } from '../support/fake-executor.js';

const UPDATE = 'UPDATE `orders` SET paid = 1';

describe('SQL router', () => {
  let app: express.Express;
  let executor: FakeExecutor;
  let sessions: SessionStore;

  beforeEach(() => {
    executor = new FakeExecutor()
      .on(/^UPDATE/, { columns: [], values: [], affectedRows: 2 })
      .on('FROM `shop`.`orders` LIMIT', resultOf(['id'], []));
    sessions = new SessionStore();
    app = express();
    app.use(createSqlRouter({ executor, sessions, settings: { secret: 'test-secret' } }));
  });

  it('should reject requests without a statement', async () => {
    const response = await request(app).get('/sql');

    expect(response.status).toBe(400);
    expect(response.text).toBe('Missing sql_query parameter.');
  });

  it('should reject a signature that does not match', async () => {
    const response = await request(app).get('/sql').query({ sql_query: UPDATE, sql_signature: 'bad' });

    expect(response.status).toBe(400);
    expect(response.text).toBe('Incorrect SQL query signature.');
    expect(executor.executed).toHaveLength(0);
  });

  it('should run a signed statement posted as a form', async () => {
    const response = await request(app)
      .post('/sql')
      .type('form')
      .send({ db: 'shop', sql_query: UPDATE, sql_signature: signSqlQuery(UPDATE, 'test-secret') });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/html/);
    expect(response.text).toContain('role="alert">2 rows affected. (Query took ');
  });

  it('should browse a table when only db and table are given', async () => {
    const response = await request(app).get('/sql').query({ db: 'shop', table: 'orders' });

    expect(response.status).toBe(200);
    expect(executor.statements).toContain('SELECT * FROM `shop`.`orders` LIMIT 0, 25');
  });

  it('should echo the session id and keep display options in the session', async () => {
    const response = await request(app)
      .get('/sql')
      .set(SESSION_HEADER, 'abc')
      .query({ sql_query: UPDATE, session_max_rows: '50' });

    expect(response.headers[SESSION_HEADER]).toBe('abc');
    const session = await sessions.load('abc', resolveSettings());
    expect(session.tmpval.max_rows).toBe(50);
  });

  it('should create a session when none is given', async () => {
    const response = await request(app).get('/sql').query({ sql_query: UPDATE });

    expect(response.headers[SESSION_HEADER]).toMatch(/^[0-9a-f-]{36}$/);
  });
});
