/**
 * Scoped remote sessions.
 *
 * A session is opened with a customer's platform token immediately before a
 * batch of related calls and closed unconditionally afterwards. Sessions are
 * never held across workflow steps.
 *
 * @packageDocumentation
 */

import { MissingCredentialError, errorMessage } from '../errors.js';
import { SilentLogger, type Logger } from '../utils/logger.js';
import { expectShape, validateLoginResponse } from './schemas.js';
import type { RemoteTransport } from './transport.js';

/**
 * Source of customers' platform tokens.
 */
export interface CredentialStore {
  /**
   * Returns the customer's platform token, or null when none is stored.
   *
   * @param customerId - The customer.
   */
  getToken(customerId: number): Promise<string | null>;
}

/**
 * Credential store over a fixed map, for tests and single-tenant setups.
 */
export class StaticCredentialStore implements CredentialStore {
  private readonly tokens: ReadonlyMap<number, string>;

  /**
   * Creates a store from customer id → token pairs.
   *
   * @param tokens - Tokens by customer id.
   */
  constructor(tokens: Iterable<readonly [number, string]>) {
    this.tokens = new Map(tokens);
  }

  async getToken(customerId: number): Promise<string | null> {
    return this.tokens.get(customerId) ?? null;
  }
}

/**
 * An open session.
 */
export interface RemoteSession {
  /** Session id returned by the login call. */
  readonly sid: string;
  /** Platform user id of the token owner. */
  readonly userId: number;
  /**
   * Calls a service within this session.
   *
   * @param svc - Service name.
   * @param params - Service parameters.
   */
  call(svc: string, params: unknown): Promise<unknown>;
}

/**
 * Opens a session, runs `fn` and closes the session on every exit path.
 *
 * A failed logout is logged and does not mask the outcome of `fn`: the
 * batch has already taken effect remotely.
 *
 * @param transport - Remote transport.
 * @param token - Platform token.
 * @param fn - The batch of calls to run.
 * @param logger - Logger for session lifecycle events.
 * @returns The result of `fn`.
 * @throws RemoteApiError if login fails or `fn` throws one.
 */
export async function withRemoteSession<T>(
  transport: RemoteTransport,
  token: string,
  fn: (session: RemoteSession) => Promise<T>,
  logger: Logger = new SilentLogger()
): Promise<T> {
  const login = expectShape('token/login', await transport.call('token/login', { token }), validateLoginResponse);
  const sid = login.eid;
  const session: RemoteSession = {
    sid,
    userId: login.user.id,
    call: (svc, params) => transport.call(svc, params, sid),
  };
  logger.debug('session_opened', { userId: session.userId });

  try {
    return await fn(session);
  } finally {
    try {
      await transport.call('core/logout', {}, sid);
      logger.debug('session_closed', { userId: session.userId });
    } catch (error) {
      logger.warn('session_logout_failed', { userId: session.userId, error: errorMessage(error) });
    }
  }
}

/**
 * Opens sessions for customers by looking up their tokens.
 */
export class SessionFactory {
  private readonly transport: RemoteTransport;
  private readonly credentials: CredentialStore;
  private readonly logger: Logger;

  /**
   * Creates a new SessionFactory.
   *
   * @param transport - Remote transport.
   * @param credentials - Token source.
   * @param logger - Logger for session lifecycle events.
   */
  constructor(transport: RemoteTransport, credentials: CredentialStore, logger: Logger = new SilentLogger()) {
    this.transport = transport;
    this.credentials = credentials;
    this.logger = logger;
  }

  /**
   * Resolves the customer's token, failing before any remote call when there is none.
   *
   * @param customerId - The customer.
   * @throws MissingCredentialError when no non-empty token is stored.
   */
  async requireToken(customerId: number): Promise<string> {
    const token = await this.credentials.getToken(customerId);
    if (token === null || token.trim() === '') {
      this.logger.warn('credential_missing', { customerId });
      throw new MissingCredentialError(customerId);
    }
    return token;
  }

  /**
   * Runs a batch of calls in a session opened with the customer's token.
   *
   * @param customerId - The customer.
   * @param fn - The batch of calls.
   * @throws MissingCredentialError before any remote call when the customer has no token.
   */
  async run<T>(customerId: number, fn: (session: RemoteSession) => Promise<T>): Promise<T> {
    const token = await this.requireToken(customerId);
    return withRemoteSession(this.transport, token, fn, this.logger);
  }
}
