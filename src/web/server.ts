/**
 * Express Server
 *
 * HTTP layer between the browser page and the connect flow. Routes:
 * - GET  /                   — Connect page (public/index.html + connect.js)
 * - GET  /api/session        — Current phase and form values for prefill
 * - POST /api/connect-token  — Validate form, request a Pluggy connect token
 * - POST /api/items          — Widget success callback, persist the item id
 * - POST /api/widget/closed  — Widget closed/errored without an item
 *
 * Each visitor gets a ConnectSessionState in their express-session; the flow
 * mutates it and express-session saves it when the response ends.
 *
 * No PII is logged here; the flow and store log through sanitizeForLog.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import session from 'express-session';
import type { ConnectFlow } from '../connect/flow.js';
import { createSessionState } from '../connect/types.js';
import type { ConnectSessionState, FlowNotice, NoticeCode } from '../connect/types.js';

declare module 'express-session' {
  interface SessionData {
    connect: ConnectSessionState;
  }
}

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PUBLIC_DIR = path.resolve(__dirname, '../../public');

/** Session cookie lifetime; an abandoned flow simply expires with it. */
const SESSION_MAX_AGE_MS = 60 * 60 * 1000;

/** HTTP status for each rejection/failure notice */
const NOTICE_STATUS: Partial<Record<NoticeCode, number>> = {
  validation: 400,
  invalid_credentials: 502,
  access_forbidden: 502,
  provider_error: 502,
  invalid_response: 502,
  rate_limited: 429,
  provider_unavailable: 503,
  network_error: 503,
  store_unavailable: 503,
  incomplete_data: 409,
  unexpected: 500,
};

const INVALID_BODY_NOTICE: FlowNotice = {
  level: 'warning',
  code: 'validation',
  message: 'Dados enviados inválidos. Recarregue a página e tente novamente.',
  retryable: false,
};

/** 4xx status carried by body-parser errors (malformed JSON, body too large) */
function clientErrorStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

/** Stop accepting connections and resolve once in-flight requests have finished. */
export function closeServer(server: { close(callback: (err?: Error) => void): unknown }): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export interface AppOptions {
  flow: ConnectFlow;
  sessionSecret: string;
  /** Send the session cookie only over HTTPS (production behind a proxy) */
  secureCookies: boolean;
}

function sessionState(req: Request): ConnectSessionState {
  if (!req.session.connect) {
    req.session.connect = createSessionState();
  }
  return req.session.connect;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory so tests can build isolated instances around a
 * flow wired to fakes.
 */
export function createApp(options: AppOptions) {
  const { flow } = options;
  const app = express();

  if (options.secureCookies) {
    app.set('trust proxy', 1);
  }

  app.use(express.json());
  app.use(session({
    name: 'financefly.sid',
    secret: options.sessionSecret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: options.secureCookies,
      maxAge: SESSION_MAX_AGE_MS,
    },
  }));
  app.use(express.static(PUBLIC_DIR));

  app.get('/api/session', (req: Request, res: Response) => {
    const state = req.session.connect ?? createSessionState();
    res.json({ phase: state.phase, form: state.form });
  });

  app.post('/api/connect-token', async (req: Request, res: Response) => {
    const state = sessionState(req);
    const outcome = await flow.submitForm(state, req.body);

    if (outcome.status === 'widget_open') {
      res.json({ connectToken: outcome.connectToken, notice: outcome.notice });
      return;
    }
    res.status(NOTICE_STATUS[outcome.notice.code] ?? 400).json({ notice: outcome.notice });
  });

  app.post('/api/items', async (req: Request, res: Response) => {
    const state = sessionState(req);
    const body: { itemId?: unknown } | undefined = req.body;
    const outcome = await flow.handleCallback(state, body?.itemId);

    switch (outcome.status) {
      case 'saved':
        res.status(201).json({ clientId: outcome.clientId, notice: outcome.notice });
        return;
      case 'already_linked':
      case 'already_processed':
        res.json({ notice: outcome.notice });
        return;
      default:
        res.status(NOTICE_STATUS[outcome.notice.code] ?? 400).json({ notice: outcome.notice });
    }
  });

  app.post('/api/widget/closed', (req: Request, res: Response) => {
    const state = sessionState(req);
    const notice = flow.abandon(state);
    res.json({ phase: state.phase, notice });
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      console.warn('[server] Rejected request body:', { status, error: err.message });
      res.status(status).json({ notice: INVALID_BODY_NOTICE });
      return;
    }
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
