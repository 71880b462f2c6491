/* ------------------------------------------------------------------ */
/*  WebSocket adapter: feeds server-side config updates into the       */
/*  page's UpdateBroker so other sessions' changes refresh this page.  */
/* ------------------------------------------------------------------ */

import type { AttachmentChangedEvent, UpdateBroker } from './update-broker.js';

/** Frame pushed by the server on /ws. */
export interface WsConfigUpdateMessage {
  type: 'config_update';
  case_id: string;
  source: string;
}

/**
 * Parses a server frame into a broker event. Returns null for anything
 * that is not a well-formed config update.
 */
export function toRemoteEvent(data: unknown): AttachmentChangedEvent | null {
  if (typeof data !== 'string') return null;

  let msg: unknown;
  try {
    msg = JSON.parse(data);
  } catch {
    return null;
  }

  if (
    typeof msg === 'object' && msg !== null &&
    'type' in msg && msg.type === 'config_update' &&
    'case_id' in msg && typeof msg.case_id === 'string'
  ) {
    return { case_id: msg.case_id, source: 'remote' };
  }
  return null;
}

export function defaultSocketUrl(): string {
  const scheme = location.protocol === 'https:' ? 'wss' : 'ws';
  return `${scheme}://${location.host}/ws`;
}

/**
 * Opens the socket and republishes every update on `broker`.
 * Returns a disconnect function.
 */
export function connect(broker: UpdateBroker, url: string = defaultSocketUrl()): () => void {
  const ws = new WebSocket(url);

  ws.onmessage = (e: MessageEvent) => {
    const event = toRemoteEvent(e.data);
    if (event) broker.publish(event);
  };

  ws.onerror = () => {
    console.warn('Config update socket error; live refresh from other sessions paused');
  };

  return () => {
    ws.onmessage = null;
    ws.onerror = null;
    ws.close();
  };
}
