/**
 * Pluggy API Client
 *
 * Obtains the short-lived connect token the Pluggy Connect widget needs:
 *
 *   1. POST /auth            { clientId, clientSecret } -> { apiKey }
 *   2. POST /connect_token   X-API-KEY: apiKey, { clientUserId } -> { accessToken }
 *
 * Every failure is mapped to a typed PluggyError (see errors.ts). No retries
 * happen here; the caller decides whether to re-invoke.
 *
 * Security:
 * - The api key lives only in this instance's memory and expires after
 *   API_KEY_TTL_MS
 * - Raw response bodies are kept on the error objects for server logs and
 *   never logged on success
 */

import type { z } from 'zod';
import type { PluggyConfig } from '../config.js';
import { sanitizeForLog } from '../web/sanitize.js';
import {
  PluggyApiError,
  PluggyAuthError,
  PluggyForbiddenError,
  PluggyInvalidResponseError,
  PluggyNetworkError,
  PluggyRateLimitError,
  PluggyUnavailableError,
} from './errors.js';
import { AuthResponseSchema, ConnectTokenResponseSchema } from './types.js';
import type { ConnectTokenIssuer } from './types.js';

/** Pluggy api keys are valid for 2 hours; refresh a little earlier. */
export const API_KEY_TTL_MS = 110 * 60 * 1000;

type Step = 'auth' | 'connect_token';

export class PluggyClient implements ConnectTokenIssuer {
  private apiKey: string | null = null;
  private apiKeyExpiresAt = 0;

  constructor(private readonly config: PluggyConfig) {}

  /**
   * Authenticate with client credentials and cache the returned api key.
   *
   * @returns The api key for subsequent requests
   */
  async authenticate(): Promise<string> {
    console.log('[pluggy] Authenticating');

    const data = await this.post('auth', '/auth', {
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
    }, {}, AuthResponseSchema);

    this.apiKey = data.apiKey;
    this.apiKeyExpiresAt = Date.now() + API_KEY_TTL_MS;
    console.log('[pluggy] Authentication successful');
    return data.apiKey;
  }

  /**
   * Issue a connect token, authenticating first when no valid api key is
   * cached.
   *
   * @param clientUserId - Identifier Pluggy attaches to the resulting item (the user's email)
   * @returns The accessToken to hand to the Connect widget
   */
  async createConnectToken(clientUserId?: string): Promise<string> {
    const apiKey = this.cachedApiKey() ?? await this.authenticate();
    const body = clientUserId ? { clientUserId } : {};

    try {
      const data = await this.post('connect_token', '/connect_token', body, { 'X-API-KEY': apiKey }, ConnectTokenResponseSchema);
      console.log('[pluggy] Connect token issued', sanitizeForLog({ email: clientUserId ?? null }));
      return data.accessToken;
    } catch (error) {
      if (error instanceof PluggyAuthError) {
        this.clearApiKey();
      }
      throw error;
    }
  }

  /** Forget the cached api key; the next token request re-authenticates. */
  clearApiKey(): void {
    this.apiKey = null;
    this.apiKeyExpiresAt = 0;
  }

  private cachedApiKey(): string | null {
    if (this.apiKey && Date.now() < this.apiKeyExpiresAt) {
      return this.apiKey;
    }
    return null;
  }

  private async post<T>(
    step: Step,
    path: string,
    body: Record<string, unknown>,
    headers: Record<string, string>,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const url = `${this.config.baseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Accept': 'application/json',
          'Content-Type': 'application/json',
          ...headers,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw this.networkError(step, 'request', error);
    }

    // The timeout signal also covers the body stream.
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.networkError(step, 'body read', error);
    }

    if (response.status !== 200) {
      console.error(`[pluggy] ${step} failed`, { status: response.status });
      throw mapStatusError(step, response.status, text);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new PluggyInvalidResponseError(`Pluggy ${step} returned a non-JSON body`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(i => i.path.join('.') || '(root)').join(', ');
      throw new PluggyInvalidResponseError(`Pluggy ${step} response failed validation: ${fields}`);
    }
    return parsed.data;
  }

  private networkError(step: Step, stage: string, error: unknown): PluggyNetworkError {
    const name = typeof error === 'object' && error !== null && 'name' in error ? error.name : undefined;
    const timedOut = name === 'TimeoutError' || name === 'AbortError';
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[pluggy] ${step} ${stage} failed`, { timedOut, reason });
    return new PluggyNetworkError(
      timedOut
        ? `Pluggy ${step} timed out after ${this.config.timeoutMs}ms`
        : `Pluggy ${step} connection failed: ${reason}`,
      timedOut,
      error,
    );
  }
}

/**
 * Map a non-200 status to its typed error.
 */
export function mapStatusError(step: Step, status: number, body: string): PluggyApiError {
  if (status === 401) return new PluggyAuthError(body);
  if (status === 403) return new PluggyForbiddenError(body);
  if (status === 429) return new PluggyRateLimitError(body);
  if (status >= 500) return new PluggyUnavailableError(status, body);
  if (step === 'connect_token' && status === 400) {
    return new PluggyApiError(
      'Pluggy connect_token rejected the request (400).',
      400,
      body,
      'Dados inválidos para geração do token. Verifique as informações.',
    );
  }
  return new PluggyApiError(`Pluggy ${step} failed with status ${status}`, status, body);
}
