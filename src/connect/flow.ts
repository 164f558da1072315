/**
 * Connect Flow — per-session state machine
 *
 *   awaiting_form --submit--> token_requested --token--> widget_open --callback--> completed
 *         ^                          |                        |
 *         +------- error / incomplete data / widget closed ---+
 *
 * Every expected failure (validation, provider, network, store) is caught
 * here and converted to a FlowNotice. Technical detail goes to the server
 * log; the notice only ever carries a user-safe message.
 *
 * The flow mutates the ConnectSessionState it is handed; the HTTP layer is
 * responsible for keeping that object in the visitor's session.
 */

import {
  PluggyError,
  PluggyAuthError,
  PluggyForbiddenError,
  PluggyInvalidResponseError,
  PluggyNetworkError,
  PluggyRateLimitError,
  PluggyUnavailableError,
} from '../pluggy/errors.js';
import type { ConnectTokenIssuer } from '../pluggy/types.js';
import type { ClientStore } from '../store/client-store.js';
import { StoreError } from '../store/client-store.js';
import { sanitizeForLog } from '../web/sanitize.js';
import { ValidationError, parseClientForm, parseItemId } from './validation.js';
import type {
  CallbackOutcome,
  ClientForm,
  ConnectSessionState,
  FlowNotice,
  NoticeCode,
  SubmitOutcome,
} from './types.js';

/** Only the most recent item ids are remembered per session. */
export const MAX_PROCESSED_ITEM_IDS = 20;

const SUPPORT_HINT = 'Se o problema persistir, entre em contato com o suporte.';

export interface ConnectFlowDeps {
  tokens: ConnectTokenIssuer;
  store: ClientStore;
}

export class ConnectFlow {
  constructor(private readonly deps: ConnectFlowDeps) {}

  /**
   * Validate the form and request a connect token for the widget.
   *
   * On success the session holds the form values and the token and is in
   * widget_open. On any failure it is back in awaiting_form.
   */
  async submitForm(state: ConnectSessionState, input: unknown): Promise<SubmitOutcome> {
    let form: ClientForm;
    try {
      form = parseClientForm(input);
    } catch (error) {
      if (error instanceof ValidationError) {
        resetToForm(state);
        return { status: 'rejected', notice: notice('warning', 'validation', error.message, false) };
      }
      throw error;
    }

    state.form = form;
    state.connectToken = null;
    state.phase = 'token_requested';

    try {
      const connectToken = await this.deps.tokens.createConnectToken(form.email);
      state.connectToken = connectToken;
      state.phase = 'widget_open';
      console.log('[connect] Widget ready', sanitizeForLog({ email: form.email }));
      return {
        status: 'widget_open',
        connectToken,
        notice: notice('info', 'token_ready', 'Abrindo o Pluggy Connect…', false),
      };
    } catch (error) {
      state.phase = 'awaiting_form';
      if (error instanceof PluggyError) {
        console.warn('[connect] Token request failed', {
          error: error.name,
          detail: error.message,
          user: sanitizeForLog({ email: form.email }),
        });
        return { status: 'rejected', notice: providerNotice(error) };
      }
      console.error('[connect] Unexpected error requesting token:', error);
      return {
        status: 'rejected',
        notice: notice('error', 'unexpected', `Erro inesperado ao gerar token de conexão. Tente novamente. ${SUPPORT_HINT}`, true),
      };
    }
  }

  /**
   * Handle the widget's success callback carrying the Pluggy item id.
   *
   * Writes at most one row per item id per session. Any phase is accepted
   * as long as the session still holds the form values, so an item reported
   * after the widget was closed is saved too. Without them nothing is written.
   */
  async handleCallback(state: ConnectSessionState, rawItemId: unknown): Promise<CallbackOutcome> {
    let itemId: string;
    try {
      itemId = parseItemId(rawItemId);
    } catch (error) {
      if (error instanceof ValidationError) {
        return { status: 'rejected', notice: notice('warning', 'validation', error.message, false) };
      }
      throw error;
    }

    if (state.processedItemIds.includes(itemId)) {
      return {
        status: 'already_processed',
        notice: notice('info', 'already_processed', `Conta já processada. itemId: ${itemId}`, false),
      };
    }

    const form = state.form;
    if (!form) {
      console.warn('[connect] Callback without form data', { itemId, phase: state.phase });
      resetToForm(state);
      return {
        status: 'incomplete',
        notice: notice('warning', 'incomplete_data', 'itemId recebido, mas faltam nome e e-mail. Preencha o formulário e conecte novamente.', false),
      };
    }

    let clientId: number | null;
    try {
      clientId = await this.deps.store.saveClient({ name: form.name, email: form.email, itemId });
    } catch (error) {
      if (error instanceof StoreError) {
        console.error('[connect] Failed to save client', { itemId, error: error.message, cause: error.cause });
        return {
          status: 'failed',
          notice: notice('error', 'store_unavailable', `Não foi possível salvar a conexão agora. Tente novamente mais tarde. ${SUPPORT_HINT}`, true),
        };
      }
      throw error;
    }

    state.processedItemIds.push(itemId);
    if (state.processedItemIds.length > MAX_PROCESSED_ITEM_IDS) {
      state.processedItemIds.splice(0, state.processedItemIds.length - MAX_PROCESSED_ITEM_IDS);
    }
    state.connectToken = null;
    state.phase = 'completed';

    if (clientId === null) {
      return {
        status: 'already_linked',
        notice: notice('info', 'already_linked', `Esta conta já estava conectada. itemId: ${itemId}`, false),
      };
    }

    return {
      status: 'saved',
      clientId,
      notice: notice('success', 'saved', `Conta conectada com sucesso! itemId: ${itemId}`, false),
    };
  }

  /**
   * Widget closed or errored without delivering an item. The form values are
   * kept so the page can prefill them.
   */
  abandon(state: ConnectSessionState): FlowNotice {
    if (state.phase === 'completed') {
      state.connectToken = null;
      return notice('info', 'abandoned', 'Pluggy Connect fechado.', false);
    }
    resetToForm(state);
    return notice('info', 'abandoned', 'Pluggy Connect fechado antes da conclusão. Você pode tentar novamente.', true);
  }
}

function resetToForm(state: ConnectSessionState): void {
  state.phase = 'awaiting_form';
  state.connectToken = null;
}

function notice(level: FlowNotice['level'], code: NoticeCode, message: string, retryable: boolean): FlowNotice {
  return { level, code, message, retryable };
}

function providerCode(error: PluggyError): NoticeCode {
  if (error instanceof PluggyAuthError) return 'invalid_credentials';
  if (error instanceof PluggyForbiddenError) return 'access_forbidden';
  if (error instanceof PluggyRateLimitError) return 'rate_limited';
  if (error instanceof PluggyUnavailableError) return 'provider_unavailable';
  if (error instanceof PluggyNetworkError) return 'network_error';
  if (error instanceof PluggyInvalidResponseError) return 'invalid_response';
  return 'provider_error';
}

/** Retryable messages already tell the user to try again; the rest get the support hint. */
export function providerNotice(error: PluggyError): FlowNotice {
  const message = error.retryable ? error.userMessage : `${error.userMessage} ${SUPPORT_HINT}`;
  return notice('error', providerCode(error), message, error.retryable);
}
