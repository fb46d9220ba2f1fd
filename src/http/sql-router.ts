import express, { Router, type NextFunction, type Request, type Response } from 'express';
import type { CacheProvider } from '../cache/cache-interfaces.js';
import { MemoryCacheAdapter } from '../cache/adapters/memory-cache-adapter.js';
import type { DbExecutor } from '../core/execution/db-executor.js';
import type { QueryLogger } from '../core/execution/query-logger.js';
import { resolveSettings, type Settings } from '../config/settings.js';
import { SqlQueryRunner } from '../runner/sql-query-runner.js';
import { SessionStore } from '../session/session-store.js';
import type { RelationParameters } from '../storage/relation-parameters.js';
import { backquote } from '../utils/format.js';
import { checkSqlQuerySignature } from '../utils/signing.js';

export interface SqlRouterOptions {
  executor: DbExecutor;
  settings?: Partial<Settings>;
  sessions?: SessionStore;
  /** Configuration storage backend; in memory by default */
  store?: CacheProvider;
  relationParameters?: RelationParameters;
  queryLogger?: QueryLogger;
  allowUserDropDatabase?: boolean;
}

export const SESSION_HEADER = 'x-session-id';

type Params = Record<string, string | undefined>;

const collectStrings = (source: unknown, into: Params): void => {
  if (typeof source !== 'object' || source === null) return;
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') into[key] = value;
  }
};

/** Query string parameters, overridden by form fields */
const readParams = (req: Request): Params => {
  const params: Params = {};
  collectStrings(req.query, params);
  collectStrings(req.body, params);
  return params;
};

/**
 * Router serving the result grid at `/sql`. The display session is picked
 * from the `x-session-id` header or the `session` parameter and echoed back
 * in the response header.
 */
export function createSqlRouter(options: SqlRouterOptions): Router {
  const settings = resolveSettings(options.settings);
  const sessions = options.sessions ?? new SessionStore();
  const store = options.store ?? new MemoryCacheAdapter();
  const router = Router();
  router.use(express.urlencoded({ extended: false }));

  const handle = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const params = readParams(req);
      const db = params.db ?? '';
      const table = params.table ?? '';
      let sqlQuery = params.sql_query ?? '';
      if (sqlQuery === '' && db !== '' && table !== '') {
        sqlQuery = `SELECT * FROM ${backquote(db)}.${backquote(table)}`;
      }
      if (sqlQuery === '') {
        res.status(400).type('text/plain').send('Missing sql_query parameter.');
        return;
      }

      const signature = params.sql_signature;
      if (signature !== undefined && !checkSqlQuerySignature(sqlQuery, signature, settings.secret)) {
        res.status(400).type('text/plain').send('Incorrect SQL query signature.');
        return;
      }

      const sessionId = req.get(SESSION_HEADER) ?? params.session;
      const session = await sessions.load(sessionId, settings);
      const runner = SqlQueryRunner.create({
        executor: options.executor,
        settings,
        session,
        store,
        relationParameters: options.relationParameters,
        queryLogger: options.queryLogger,
        allowUserDropDatabase: options.allowUserDropDatabase,
      });

      const server = Number(params.server ?? '1');
      const html = await runner.executeQueryAndGetResponse({
        db,
        table,
        sqlQuery,
        goto: params.goto ?? '',
        server: Number.isInteger(server) ? server : 1,
        params,
      });
      await sessions.save(session);

      res.set(SESSION_HEADER, session.id).type('html').send(html);
    } catch (error) {
      next(error);
    }
  };

  router.get('/sql', (req, res, next) => {
    void handle(req, res, next);
  });
  router.post('/sql', (req, res, next) => {
    void handle(req, res, next);
  });

  return router;
}
