/**
 * Tests for the Express server
 *
 * The flow runs against a vi.fn token issuer and the in-memory ClientStore
 * (no Pluggy or PostgreSQL). supertest agents carry the session cookie
 * between requests, so each agent is one visitor.
 */

import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { closeServer, createApp } from '../server.js';
import { ConnectFlow } from '../../connect/flow.js';
import {
  PluggyAuthError,
  PluggyRateLimitError,
  PluggyUnavailableError,
} from '../../pluggy/errors.js';
import { MemoryClientStore } from '../../store/__tests__/memory-client-store.js';

const ANA = { name: 'Ana Silva', email: 'ana@example.com' };

describe('Connect server', () => {
  const createConnectToken = vi.fn<(clientUserId?: string) => Promise<string>>();
  let store: MemoryClientStore;

  function newVisitor() {
    const flow = new ConnectFlow({ tokens: { createConnectToken }, store });
    return request.agent(createApp({ flow, sessionSecret: 'test-secret', secureCookies: false }));
  }

  beforeEach(() => {
    createConnectToken.mockReset();
    store = new MemoryClientStore();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /', () => {
    it('serves the connect page', async () => {
      const res = await newVisitor().get('/').expect(200);

      expect(res.headers['content-type']).toContain('text/html');
      expect(res.text).toContain('id="connect-form"');
    });
  });

  describe('GET /api/session', () => {
    it('reports an empty form for a new visitor', async () => {
      const res = await newVisitor().get('/api/session').expect(200);

      expect(res.body).toEqual({ phase: 'awaiting_form', form: null });
    });

    it('returns the submitted form for prefill', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);

      const res = await agent.get('/api/session').expect(200);

      expect(res.body).toEqual({ phase: 'widget_open', form: ANA });
    });
  });

  describe('POST /api/connect-token', () => {
    it('returns the connect token', async () => {
      createConnectToken.mockResolvedValueOnce('t1');

      const res = await newVisitor().post('/api/connect-token').send(ANA).expect(200);

      expect(res.body).toEqual({
        connectToken: 't1',
        notice: { level: 'info', code: 'token_ready', message: 'Abrindo o Pluggy Connect…', retryable: false },
      });
      expect(createConnectToken).toHaveBeenCalledWith('ana@example.com');
    });

    it('returns 400 for an incomplete form', async () => {
      const res = await newVisitor()
        .post('/api/connect-token')
        .send({ name: 'Ana Silva' })
        .expect(400);

      expect(res.body.notice).toEqual({
        level: 'warning',
        code: 'validation',
        message: 'Preencha todos os campos.',
        retryable: false,
      });
      expect(createConnectToken).not.toHaveBeenCalled();
    });

    it('returns 400 when no body is sent', async () => {
      const res = await newVisitor().post('/api/connect-token').expect(400);

      expect(res.body.notice.code).toBe('validation');
    });

    it('answers a malformed JSON body with 400 and a validation notice', async () => {
      const res = await newVisitor()
        .post('/api/connect-token')
        .set('Content-Type', 'application/json')
        .send('{"name": "Ana",')
        .expect(400);

      expect(res.body).toEqual({
        notice: {
          level: 'warning',
          code: 'validation',
          message: 'Dados enviados inválidos. Recarregue a página e tente novamente.',
          retryable: false,
        },
      });
      expect(createConnectToken).not.toHaveBeenCalled();
    });

    it('answers an oversized body with 413', async () => {
      const res = await newVisitor()
        .post('/api/connect-token')
        .send({ name: 'x'.repeat(200 * 1024), email: 'ana@example.com' })
        .expect(413);

      expect(res.body.notice.code).toBe('validation');
      expect(createConnectToken).not.toHaveBeenCalled();
    });

    it.each([
      ['rate_limited', new PluggyRateLimitError('{}'), 429],
      ['provider_unavailable', new PluggyUnavailableError(503, '{}'), 503],
      ['invalid_credentials', new PluggyAuthError('{}'), 502],
    ])('maps %s to HTTP %i', async (code, error, status) => {
      createConnectToken.mockRejectedValueOnce(error);

      const res = await newVisitor().post('/api/connect-token').send(ANA).expect(status);

      expect(res.body.notice.code).toBe(code);
      expect(res.body).not.toHaveProperty('connectToken');
    });

    it('maps an unexpected failure to 500 with a generic notice', async () => {
      createConnectToken.mockRejectedValueOnce(new RangeError('boom'));

      const res = await newVisitor().post('/api/connect-token').send(ANA).expect(500);

      expect(res.body.notice.code).toBe('unexpected');
      expect(res.body.notice.message).not.toContain('boom');
    });
  });

  describe('POST /api/items', () => {
    it('saves the client and returns 201', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);

      const res = await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(201);

      expect(res.body).toEqual({
        clientId: 1,
        notice: { level: 'success', code: 'saved', message: 'Conta conectada com sucesso! itemId: ext-123', retryable: false },
      });
      expect(store.records).toHaveLength(1);
      expect(store.records[0]).toMatchObject({ name: 'Ana Silva', email: 'ana@example.com', itemId: 'ext-123' });
    });

    it('answers a replayed callback with 200 and no second row', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);
      await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(201);

      const res = await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(200);

      expect(res.body.notice.code).toBe('already_processed');
      expect(store.records).toHaveLength(1);
    });

    it('answers 200 when another visitor already linked the item', async () => {
      await store.saveClient({ name: 'Bruno', email: 'bruno@example.com', itemId: 'ext-123' });
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);

      const res = await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(200);

      expect(res.body.notice.code).toBe('already_linked');
      expect(store.records).toHaveLength(1);
    });

    it('saves an item reported after the widget was closed', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);
      await agent.post('/api/widget/closed').expect(200);

      const res = await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(201);

      expect(res.body.notice.code).toBe('saved');
      expect(store.records).toHaveLength(1);
    });

    it('returns 409 when the session has no form values', async () => {
      const res = await newVisitor().post('/api/items').send({ itemId: 'ext-123' }).expect(409);

      expect(res.body.notice.code).toBe('incomplete_data');
      expect(store.records).toHaveLength(0);
    });

    it('returns 400 for a blank item id', async () => {
      const res = await newVisitor().post('/api/items').send({ itemId: ' ' }).expect(400);

      expect(res.body.notice.message).toBe('itemId ausente.');
    });

    it('returns 503 while the store is unavailable', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);
      store.unavailable = true;

      const res = await agent.post('/api/items').send({ itemId: 'ext-123' }).expect(503);

      expect(res.body.notice).toMatchObject({ code: 'store_unavailable', retryable: true });
    });
  });

  describe('POST /api/widget/closed', () => {
    it('returns the session to the form', async () => {
      createConnectToken.mockResolvedValueOnce('t1');
      const agent = newVisitor();
      await agent.post('/api/connect-token').send(ANA).expect(200);

      const res = await agent.post('/api/widget/closed').expect(200);

      expect(res.body.phase).toBe('awaiting_form');
      expect(res.body.notice).toMatchObject({ code: 'abandoned', retryable: true });

      const session = await agent.get('/api/session').expect(200);
      expect(session.body).toEqual({ phase: 'awaiting_form', form: ANA });
    });
  });
});

describe('closeServer', () => {
  it('resolves once the server has closed', async () => {
    const close = vi.fn((callback: (err?: Error) => void) => {
      callback();
    });

    await expect(closeServer({ close })).resolves.toBeUndefined();
    expect(close).toHaveBeenCalledOnce();
  });

  it('rejects when closing fails', async () => {
    const close = vi.fn((callback: (err?: Error) => void) => {
      callback(new Error('Server is not running.'));
    });

    await expect(closeServer({ close })).rejects.toThrow('Server is not running.');
  });
});
