// ============================================================================
// Pluggy Error Types — Typed errors for aggregation API failures
// ============================================================================

/**
 * Base error for everything the Pluggy client can throw.
 *
 * `message` is the technical description (logged server-side only);
 * `userMessage` is the pt-BR text safe to show to the end user.
 */
export class PluggyError extends Error {
  readonly userMessage: string;
  readonly retryable: boolean;

  constructor(message: string, userMessage: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PluggyError';
    this.userMessage = userMessage;
    this.retryable = retryable;
  }
}

/**
 * Non-200 answer from the API. Keeps the status code and raw body for
 * debugging; the body may echo request data and must not reach the user.
 */
export class PluggyApiError extends PluggyError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(
    message: string,
    statusCode: number,
    responseBody: string,
    userMessage = `Erro ao comunicar com o serviço Pluggy (código ${statusCode}).`,
    retryable = false,
  ) {
    super(message, userMessage, retryable);
    this.name = 'PluggyApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** HTTP 401: client id/secret rejected, or the api key expired. */
export class PluggyAuthError extends PluggyApiError {
  constructor(responseBody: string) {
    super(
      'Pluggy API authentication failed (401). Check PLUGGY_CLIENT_ID and PLUGGY_CLIENT_SECRET.',
      401,
      responseBody,
      'Credenciais Pluggy inválidas. Verifique a configuração.',
    );
    this.name = 'PluggyAuthError';
  }
}

/** HTTP 403 */
export class PluggyForbiddenError extends PluggyApiError {
  constructor(responseBody: string) {
    super(
      'Pluggy API access forbidden (403).',
      403,
      responseBody,
      'Acesso negado pelo serviço Pluggy. Verifique suas permissões.',
    );
    this.name = 'PluggyForbiddenError';
  }
}

/**
 * HTTP 429. Callers should back off before letting the user retry.
 */
export class PluggyRateLimitError extends PluggyApiError {
  constructor(responseBody: string) {
    super(
      'Pluggy API rate limit exceeded (429). Retry after backoff.',
      429,
      responseBody,
      'Muitas tentativas de conexão. Aguarde alguns minutos e tente novamente.',
      true,
    );
    this.name = 'PluggyRateLimitError';
  }
}

/** HTTP 5xx */
export class PluggyUnavailableError extends PluggyApiError {
  constructor(statusCode: number, responseBody: string) {
    super(
      `Pluggy API server error (${statusCode}).`,
      statusCode,
      responseBody,
      'Serviço Pluggy temporariamente indisponível. Tente novamente em alguns minutos.',
      true,
    );
    this.name = 'PluggyUnavailableError';
  }
}

/** Timeout or connection failure before any response arrived. */
export class PluggyNetworkError extends PluggyError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, cause: unknown) {
    super(
      message,
      timedOut
        ? 'Timeout ao conectar com o serviço Pluggy. Verifique sua conexão e tente novamente.'
        : 'Erro de conexão com o serviço Pluggy. Verifique sua internet e tente novamente.',
      true,
      { cause },
    );
    this.name = 'PluggyNetworkError';
    this.timedOut = timedOut;
  }
}

/** 200 answer whose body is not JSON or lacks the expected field. */
export class PluggyInvalidResponseError extends PluggyError {
  constructor(message: string) {
    super(message, 'Resposta inválida do serviço Pluggy. Tente novamente.', false);
    this.name = 'PluggyInvalidResponseError';
  }
}
