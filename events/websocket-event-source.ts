import WebSocket from 'ws';
import type { Logger } from 'pino';
import { createComponentLogger } from '../logging/logger';
import type { EventSource, EventSourceHandlers, EventSubscription } from './event-source';
import { parseFeedRecord, type ParseResult } from './feed-record';

export interface WebSocketEventSourceOptions {
  url: string;
  agentId: string;
  token?: string;
  /** Delay grows linearly with consecutive failures. Default: 5000. */
  reconnectDelayMs?: number;
  /** Default: 60000. */
  maxReconnectDelayMs?: number;
  createSocket?: (url: string, headers: Record<string, string>) => WebSocket;
  logger?: Logger;
  getTime?: () => number;
}

/**
 * Decodes one text frame into a runtime event.
 */
export function parseFeedFrame(data: WebSocket.RawData | string, receivedAt: number): ParseResult {
  const text = typeof data === 'string' ? data : rawDataToString(data);
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'frame is not valid JSON' };
  }
  return parseFeedRecord(decoded, receivedAt);
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Live feed subscription over WebSocket. Reconnects until closed; the hello frame
 * identifies the agent so the server resumes delivery for it.
 */
export class WebSocketEventSource implements EventSource {
  private readonly reconnectDelayMs: number;
  private readonly maxReconnectDelayMs: number;
  private readonly logger: Logger;
  private readonly getTime: () => number;

  constructor(private readonly options: WebSocketEventSourceOptions) {
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5000;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 60_000;
    this.logger = options.logger ?? createComponentLogger('feed');
    this.getTime = options.getTime ?? (() => Date.now());
  }

  subscribe(handlers: EventSourceHandlers): EventSubscription {
    let socket: WebSocket | null = null;
    let reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    let failures = 0;
    let closed = false;

    const connect = (): void => {
      const headers: Record<string, string> = {};
      if (this.options.token) {
        headers.Authorization = `Bearer ${this.options.token}`;
      }
      const ws = this.options.createSocket
        ? this.options.createSocket(this.options.url, headers)
        : new WebSocket(this.options.url, { headers });
      socket = ws;

      ws.on('open', () => {
        failures = 0;
        this.logger.info({ url: this.options.url }, 'feed connected');
        ws.send(JSON.stringify({ type: 'hello', agent_id: this.options.agentId }));
      });

      ws.on('message', (data: WebSocket.RawData) => {
        const parsed = parseFeedFrame(data, this.getTime());
        if (!parsed.ok) {
          this.logger.warn({ reason: parsed.reason }, 'dropping malformed feed record');
          return;
        }
        handlers.onEvent(parsed.event);
      });

      ws.on('error', (error: Error) => {
        this.logger.error({ err: error }, 'feed socket error');
        handlers.onError?.(error);
      });

      ws.on('close', (code: number) => {
        socket = null;
        if (closed) {
          return;
        }
        failures++;
        const delay = Math.min(this.reconnectDelayMs * failures, this.maxReconnectDelayMs);
        this.logger.warn({ code, delay, attempt: failures }, 'feed closed, reconnecting');
        reconnectTimer = setTimeout(connect, delay);
      });
    };

    connect();

    return {
      close: () => {
        closed = true;
        if (reconnectTimer) {
          clearTimeout(reconnectTimer);
          reconnectTimer = null;
        }
        const current = socket;
        if (!current || current.readyState === WebSocket.CLOSED) {
          return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
          current.once('close', () => resolve());
          current.close(1000, 'shutdown');
        });
      }
    };
  }
}
