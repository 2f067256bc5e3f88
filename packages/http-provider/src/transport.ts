import { logger, getTraceHeaders } from '@remote-cloud/shared';
import { TransportError, type TransportErrorKind } from './errors.js';

const log = logger.child({ module: 'http-transport' });

/** Covers connecting, sending and reading the whole response. */
export const HTTP_PROVIDER_TIMEOUT_MS = 5_000;

const MAX_ERROR_BODY_CHARS = 512;

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  /** Operation name, used for error context and logs. */
  operation: string;
  method: HttpMethod;
  url: string;
  /** Serialized JSON body. */
  body?: string;
}

/** Single-attempt request/response sender returning the buffered body. */
export interface Transport {
  send(request: TransportRequest): Promise<Buffer>;
}

export interface FetchTransportOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function errorDetail(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
  return `${err.message}${cause}`;
}

/**
 * Transport over the global fetch. Each call gets its own timeout signal and
 * is attempted exactly once.
 */
export function createFetchTransport(options: FetchTransportOptions = {}): Transport {
  const timeoutMs = options.timeoutMs ?? HTTP_PROVIDER_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  async function send(request: TransportRequest): Promise<Buffer> {
    const { operation, method, url, body } = request;
    const signal = AbortSignal.timeout(timeoutMs);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...getTraceHeaders(),
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const started = Date.now();
    log.debug({ operation, method, url }, 'sending request');

    let status: number;
    let payload: Buffer;
    try {
      const res = await fetchImpl(url, { method, headers, body, signal });
      status = res.status;
      // Always drain the body so the connection goes back to the pool.
      payload = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      const kind: TransportErrorKind = signal.aborted ? 'timeout' : 'connection';
      const message =
        kind === 'timeout' ? `request timed out after ${timeoutMs}ms` : `request failed: ${errorDetail(err)}`;
      log.warn({ operation, method, url, kind, err }, 'http request failed');
      throw new TransportError(kind, message, { operation, url, cause: err });
    }

    if (status >= 400) {
      const detail = payload.toString('utf-8').slice(0, MAX_ERROR_BODY_CHARS);
      log.warn({ operation, method, url, status }, 'remote service returned an error status');
      throw new TransportError('status', `remote service returned ${status}${detail ? `: ${detail}` : ''}`, {
        operation,
        url,
        status,
      });
    }

    log.debug(
      { operation, method, url, status, bytes: payload.length, durationMs: Date.now() - started },
      'request completed',
    );
    return payload;
  }

  return { send };
}
