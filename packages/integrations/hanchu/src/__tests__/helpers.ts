import type { HttpTransport, TransportRequest, TransportResponse } from '@essbridge/integrations-core';
import { createCredentials } from '@essbridge/integrations-core';
import type { Logger } from '../auth-session';
import { API_LOGIN } from '../constants';
import { aesDecrypt } from '../envelope';

export type Handler = (request: TransportRequest) => TransportResponse | Promise<TransportResponse>;

/**
 * In-process stand-in for the cloud: one handler per URL path
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: TransportRequest[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(path: string, handler: Handler): this {
    this.handlers.set(path, handler);
    return this;
  }

  async post(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const handler = this.handlers.get(new URL(request.url).pathname);
    if (!handler) {
      return { status: 404, body: undefined };
    }
    return handler(request);
  }

  paths(): string[] {
    return this.requests.map((request) => new URL(request.url).pathname);
  }

  count(path: string): number {
    return this.paths().filter((p) => p === path).length;
  }

  /** Decrypted JSON bodies sent to a path, in order */
  payloads(path: string): unknown[] {
    return this.requests
      .filter((request) => new URL(request.url).pathname === path)
      .map((request): unknown => JSON.parse(aesDecrypt(request.body)));
  }
}

function base64url(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

/** Unsigned JWT-shaped token with the given exp (epoch seconds) */
export function makeToken(exp: number, subject = 'test-user'): string {
  return `${base64url({ alg: 'HS256', typ: 'JWT' })}.${base64url({ sub: subject, exp })}.test-signature`;
}

export function loginOk(token: string): TransportResponse {
  return { status: 200, body: { success: true, code: 200, data: token } };
}

export function ok(data: unknown): TransportResponse {
  return { status: 200, body: { success: true, code: 200, data } };
}

export function withLogin(transport: ScriptedTransport, token = makeToken(4102444800)): ScriptedTransport {
  return transport.on(API_LOGIN, () => loginOk(token));
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const credentials = createCredentials({
  username: 'user@example.com',
  password: 'test-secret',
  inverterSerial: 'INV-0001',
  batteryRackSerial: 'RACK-0001',
});

export const inverterOnlyCredentials = createCredentials({
  username: 'user@example.com',
  password: 'test-secret',
  inverterSerial: 'INV-0001',
});

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
