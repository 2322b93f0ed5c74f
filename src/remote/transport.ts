/**
 * HTTP transport for the remote telemetry platform's AJAX API.
 *
 * Every call is a form-encoded POST of `svc`, `params` (JSON) and, once
 * logged in, `sid`. The platform reports failures in-band as
 * `{ "error": <code>, "reason"?: <text> }`.
 *
 * @packageDocumentation
 */

import { RemoteApiError, errorMessage, toError } from '../errors.js';
import { SilentLogger, type Logger } from '../utils/logger.js';

/**
 * Sends one service call to the platform.
 */
export interface RemoteTransport {
  /**
   * Calls a remote service.
   *
   * @param svc - Service name, e.g. `resource/update_notification`.
   * @param params - Service parameters, sent as JSON.
   * @param sid - Session id, omitted for `token/login`.
   * @returns The decoded response body.
   * @throws RemoteApiError for in-band errors, HTTP failures and timeouts.
   */
  call(svc: string, params: unknown, sid?: string): Promise<unknown>;
}

/**
 * Human-readable names of the platform's error codes.
 */
export const REMOTE_ERROR_CODES: ReadonlyMap<number, string> = new Map([
  [1, 'Invalid session'],
  [2, 'Invalid service name'],
  [3, 'Invalid result'],
  [4, 'Invalid input'],
  [5, 'Error performing request'],
  [6, 'Unknown error'],
  [7, 'Access denied'],
  [8, 'Invalid user name or password'],
  [9, 'Authorization server is unavailable'],
  [10, 'Reached limit of concurrent requests'],
  [11, 'Password reset error'],
  [14, 'Billing error'],
  [1001, 'No messages for selected interval'],
  [1002, 'Item with such unique property already exists or item cannot be created according to billing restrictions'],
  [1003, 'Only one request is allowed at the moment'],
  [1004, 'Limit of messages has been exceeded'],
  [1005, 'Execution time has exceeded the limit'],
  [1006, 'Exceeding the limit of attempts to enter a two-factor authorization code'],
  [1011, 'Your IP has changed or session has expired'],
  [2014, 'Selected user is a creator for some system objects'],
  [2015, 'Sensor deleting is forbidden because of using in another sensor or advanced properties of the unit'],
]);

/**
 * Reads an in-band error from a response body.
 *
 * @param body - Decoded response body.
 * @returns The error code and reason, or undefined for a successful body.
 */
export function readRemoteError(body: unknown): { code: number; reason: string | undefined } | undefined {
  if (typeof body !== 'object' || body === null || Array.isArray(body) || !('error' in body)) {
    return undefined;
  }
  const code = body.error;
  if (typeof code !== 'number' || code === 0) {
    return undefined;
  }
  const reason = 'reason' in body && typeof body.reason === 'string' ? body.reason : undefined;
  return { code, reason };
}

/**
 * Options for {@link HttpTransport}.
 */
export interface HttpTransportOptions {
  /** Platform base URL, e.g. `https://hst-api.wialon.com`. */
  readonly baseUrl: string;
  /** Per-call timeout in milliseconds (default: 15000). */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

/**
 * Transport over the global `fetch`.
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({ baseUrl: 'https://hst-api.wialon.com', timeoutMs: 10000 });
 * const body = await transport.call('core/logout', {}, sid);
 * ```
 */
export class HttpTransport implements RemoteTransport {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  /**
   * Creates a new HttpTransport.
   *
   * @param options - Base URL, timeout and logger.
   */
  constructor(options: HttpTransportOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/wialon/ajax.html`;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? new SilentLogger();
  }

  async call(svc: string, params: unknown, sid?: string): Promise<unknown> {
    const form = new URLSearchParams({ svc, params: JSON.stringify(params) });
    if (sid !== undefined) {
      form.set('sid', sid);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let response: Response;
    try {
      this.logger.debug('request_sent', { svc });
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        this.logger.error('request_timeout', { svc, timeoutMs: this.timeoutMs });
        throw new RemoteApiError(
          `Remote call '${svc}' timed out after ${String(this.timeoutMs)}ms`,
          'timeout',
          svc,
          { cause: error }
        );
      }
      this.logger.error('request_failed', { svc, error: errorMessage(error) });
      throw new RemoteApiError(`Remote call '${svc}' failed: ${errorMessage(error)}`, 'transport', svc, {
        cause: toError(error),
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      this.logger.error('http_error', { svc, status: response.status });
      throw new RemoteApiError(
        `Remote call '${svc}' returned HTTP ${String(response.status)} ${response.statusText}`,
        'transport',
        svc
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RemoteApiError(`Remote call '${svc}' returned a non-JSON body`, 'malformed_response', svc, {
        cause: toError(error),
      });
    }

    const remoteError = readRemoteError(body);
    if (remoteError !== undefined) {
      const description = REMOTE_ERROR_CODES.get(remoteError.code) ?? 'Unknown error code';
      this.logger.warn('remote_error', { svc, code: remoteError.code });
      throw new RemoteApiError(
        `Remote call '${svc}' failed with error ${String(remoteError.code)} (${description})` +
          (remoteError.reason !== undefined ? `: ${remoteError.reason}` : ''),
        remoteError.code,
        svc,
        remoteError.reason !== undefined ? { reason: remoteError.reason } : {}
      );
    }

    this.logger.debug('response_received', { svc });
    return body;
  }
}
