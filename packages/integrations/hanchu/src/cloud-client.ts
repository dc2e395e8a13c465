import {
  AuthError,
  NetworkError,
  describeError,
  isAdapterError,
  isRawPayload,
  readNumber,
  type HttpTransport,
  type RawPayload,
  type TransportResponse,
} from '@essbridge/integrations-core';
import type { AuthSession } from './auth-session';
import { API_BASE, APP_HEADERS } from './constants';
import { aesEncrypt } from './envelope';

/**
 * Authenticated, encrypted POSTs against the IESS cloud.
 *
 * Returns the decoded response body; the `success` flag is left to the caller
 * because telemetry and commands interpret a refusal differently.
 */
export class CloudClient {
  constructor(
    private readonly session: AuthSession,
    private readonly transport: HttpTransport,
    private readonly baseUrl: string = API_BASE,
  ) {}

  async post(path: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<RawPayload> {
    const current = await this.session.ensureValid(signal);

    let response: TransportResponse;
    try {
      response = await this.transport.post({
        url: `${this.baseUrl}${path}`,
        headers: { ...APP_HEADERS, 'content-type': 'text/plain', 'access-token': current.token },
        body: aesEncrypt(payload),
        signal,
      });
    } catch (error) {
      if (isAdapterError(error)) throw error;
      throw new NetworkError(`POST ${path} failed: ${describeError(error)}`);
    }

    const body = response.body;

    if (response.status === 401 || response.status === 403 || isRejectedSession(body)) {
      this.session.invalidate(current);
      throw new AuthError(`Session rejected by ${path}`, response.status);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(`POST ${path} returned HTTP ${response.status}`, response.status);
    }

    if (!isRawPayload(body)) {
      throw new NetworkError(`POST ${path} returned an unreadable body`, response.status);
    }

    return body;
  }

  /**
   * For telemetry: a refused request means the data is not available right now
   */
  async fetchData(path: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const body = await this.post(path, payload, signal);

    if (body.success !== true) {
      throw new NetworkError(`${path} failed: ${responseMessage(body)}`);
    }

    return body.data;
  }
}

function isRejectedSession(body: unknown): boolean {
  return isRawPayload(body) && readNumber(body, 'code') === 401;
}

export function responseMessage(body: RawPayload): string {
  if (typeof body.msg === 'string' && body.msg !== '') return body.msg;
  if (typeof body.message === 'string' && body.message !== '') return body.message;
  const code = readNumber(body, 'code');
  return code === null ? 'unknown error' : `code ${code}`;
}
