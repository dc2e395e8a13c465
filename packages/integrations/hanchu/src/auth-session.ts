/**
 * Session handling for the IESS cloud
 *
 * One login at a time process-wide: concurrent callers share the login in
 * flight and all receive its session or its AuthError. Login failures are not
 * retried; retry policy belongs to the callers.
 */

import jwt from 'jsonwebtoken';
import { Mutex } from 'async-mutex';
import {
  AuthError,
  describeError,
  isRawPayload,
  readNumber,
  type EssCredentials,
  type HttpTransport,
  type TransportResponse,
} from '@essbridge/integrations-core';
import { API_BASE, API_LOGIN, APP_HEADERS, TOKEN_REFRESH_MARGIN_MS } from './constants';
import { aesEncrypt, rsaEncrypt } from './envelope';

export interface Session {
  readonly token: string;
  readonly obtainedAt: Date;
  readonly expiresAt?: Date;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface AuthSessionOptions {
  baseUrl?: string;
  now?: () => number;
  logger?: Logger;
}

export class AuthSession {
  private session: Session | null = null;
  private loginInFlight: Promise<Session> | null = null;
  private closed = false;
  private readonly mutex = new Mutex();
  private readonly baseUrl: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly credentials: EssCredentials,
    private readonly transport: HttpTransport,
    options: AuthSessionOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? API_BASE;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
  }

  /**
   * Returns a usable session, logging in if there is none or it is due for refresh
   */
  async ensureValid(signal?: AbortSignal): Promise<Session> {
    const current = this.session;
    if (current && this.isFresh(current)) {
      return current;
    }

    if (this.loginInFlight) {
      return this.loginInFlight;
    }

    const inFlight = this.mutex
      .runExclusive(async () => {
        // A session may have been stored while the lock was held elsewhere
        const latest = this.session;
        if (latest && this.isFresh(latest)) {
          return latest;
        }

        this.session = await this.login(signal);
        return this.session;
      })
      .finally(() => {
        if (this.loginInFlight === inFlight) {
          this.loginInFlight = null;
        }
      });

    this.loginInFlight = inFlight;
    return inFlight;
  }

  /**
   * Drop the session after the cloud rejected it
   */
  invalidate(rejected?: Session): void {
    // A newer session obtained by another caller stays
    if (rejected && this.session !== rejected) {
      return;
    }
    this.session = null;
  }

  close(): void {
    this.closed = true;
    this.session = null;
  }

  private isFresh(session: Session): boolean {
    if (!session.expiresAt) {
      return true;
    }

    const obtained = session.obtainedAt.getTime();
    const expires = session.expiresAt.getTime();
    const margin = Math.min(TOKEN_REFRESH_MARGIN_MS, (expires - obtained) / 2);

    return this.now() < expires - margin;
  }

  private async login(signal?: AbortSignal): Promise<Session> {
    if (this.closed) {
      throw new AuthError('Session is closed');
    }

    let body: string;
    try {
      const pwd = rsaEncrypt(this.credentials.password);
      body = aesEncrypt({ account: this.credentials.username, pwd });
    } catch (error) {
      throw new AuthError(`Could not encrypt login request: ${describeError(error)}`);
    }

    let response: TransportResponse;
    try {
      response = await this.transport.post({
        url: `${this.baseUrl}${API_LOGIN}`,
        headers: { ...APP_HEADERS, 'content-type': 'text/plain', 'access-token': '' },
        body,
        signal,
      });
    } catch (error) {
      throw new AuthError(`Login request failed: ${describeError(error)}`);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new AuthError(`Login failed with HTTP ${response.status}`, response.status);
    }

    const payload = response.body;
    if (!isRawPayload(payload) || payload.success !== true || readNumber(payload, 'code') !== 200) {
      const message = isRawPayload(payload) && typeof payload.msg === 'string' ? payload.msg : 'rejected';
      throw new AuthError(`Login failed: ${message}`, response.status);
    }

    const token = payload.data;
    if (typeof token !== 'string' || token === '') {
      throw new AuthError('Login response contained no token', response.status);
    }

    const session: Session = {
      token,
      obtainedAt: new Date(this.now()),
      expiresAt: decodeExpiry(token),
    };

    this.logger.log(
      `[Hanchu] Authenticated as ${this.credentials.username}` +
        (session.expiresAt ? `, token expires ${session.expiresAt.toISOString()}` : ''),
    );

    return session;
  }
}

/**
 * Reads the exp claim without verifying the signature
 */
export function decodeExpiry(token: string): Date | undefined {
  const decoded = jwt.decode(token, { json: true });
  if (!decoded || typeof decoded.exp !== 'number') {
    return undefined;
  }
  return new Date(decoded.exp * 1000);
}
