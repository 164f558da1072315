/**
 * Connect Flow Type Definitions
 *
 * Contract between the flow (flow.ts), the HTTP layer (web/server.ts) and
 * the browser page. Session state must stay JSON-serializable: it is kept in
 * the express-session store between requests.
 */

export type ConnectPhase = 'awaiting_form' | 'token_requested' | 'widget_open' | 'completed';

export interface ClientForm {
  name: string;
  email: string;
}

/** Per-browser-session state of one connect attempt */
export interface ConnectSessionState {
  phase: ConnectPhase;
  /** Values from the last accepted form submission */
  form: ClientForm | null;
  /** Token issued for the widget; cleared once the widget completes or closes */
  connectToken: string | null;
  /** Recent item ids handled in this session, so a repeated callback never re-saves */
  processedItemIds: string[];
}

export type NoticeCode =
  | 'validation'
  | 'invalid_credentials'
  | 'access_forbidden'
  | 'rate_limited'
  | 'provider_unavailable'
  | 'provider_error'
  | 'network_error'
  | 'invalid_response'
  | 'store_unavailable'
  | 'incomplete_data'
  | 'unexpected'
  | 'token_ready'
  | 'saved'
  | 'already_linked'
  | 'already_processed'
  | 'abandoned';

/** User-safe message surfaced by the flow; never carries technical detail. */
export interface FlowNotice {
  level: 'success' | 'info' | 'warning' | 'error';
  code: NoticeCode;
  message: string;
  retryable: boolean;
}

export type SubmitOutcome =
  | { status: 'widget_open'; connectToken: string; notice: FlowNotice }
  | { status: 'rejected'; notice: FlowNotice };

export type CallbackOutcome =
  | { status: 'saved'; clientId: number; notice: FlowNotice }
  | { status: 'already_linked'; notice: FlowNotice }
  | { status: 'already_processed'; notice: FlowNotice }
  | { status: 'incomplete'; notice: FlowNotice }
  | { status: 'rejected'; notice: FlowNotice }
  | { status: 'failed'; notice: FlowNotice };

export function createSessionState(): ConnectSessionState {
  return {
    phase: 'awaiting_form',
    form: null,
    connectToken: null,
    processedItemIds: [],
  };
}
