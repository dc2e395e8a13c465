import { describe, it, expect } from '@jest/globals';
import { AuthError, NetworkError } from '@essbridge/integrations-core';
import { AuthSession, decodeExpiry } from '../auth-session';
import { API_LOGIN } from '../constants';
import { aesDecrypt } from '../envelope';
import { ScriptedTransport, credentials, deferred, loginOk, makeToken, silentLogger } from './helpers';

const BASE_URL = 'https://cloud.test';
const DAY_MS = 24 * 60 * 60 * 1000;

describe('AuthSession', () => {
  it('should log in once for concurrent callers', async () => {
    const gate = deferred<void>();
    const transport = new ScriptedTransport().on(API_LOGIN, async () => {
      await gate.promise;
      return loginOk(makeToken(4102444800));
    });
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    const first = session.ensureValid();
    const second = session.ensureValid();
    gate.resolve();

    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(transport.count(API_LOGIN)).toBe(1);
  });

  it('should share one failed login between concurrent callers', async () => {
    const gate = deferred<void>();
    const transport = new ScriptedTransport().on(API_LOGIN, async () => {
      await gate.promise;
      return { status: 200, body: { success: false, code: 500, msg: 'account or password error' } };
    });
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    const callers = [session.ensureValid(), session.ensureValid(), session.ensureValid()];
    gate.resolve();
    const results = await Promise.allSettled(callers);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected', 'rejected']);
    for (const result of results) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(AuthError);
      }
    }
    expect(transport.count(API_LOGIN)).toBe(1);
  });

  it('should reuse a fresh session without another login', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => loginOk(makeToken(4102444800)));
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await session.ensureValid();
    await session.ensureValid();

    expect(transport.count(API_LOGIN)).toBe(1);
  });

  it('should send the account and an encrypted password', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => loginOk(makeToken(4102444800)));
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await session.ensureValid();

    const [request] = transport.requests;
    expect(request.headers['content-type']).toBe('text/plain');
    const body: unknown = JSON.parse(aesDecrypt(request.body));
    expect(body).toEqual({ account: 'user@example.com', pwd: expect.any(String) });
    expect(request.body).not.toContain('test-secret');
  });

  it('should raise AuthError when the cloud rejects the credentials', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => ({
      status: 200,
      body: { success: false, code: 500, msg: 'account or password error' },
    }));
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await expect(session.ensureValid()).rejects.toThrow(new AuthError('Login failed: account or password error'));
  });

  it('should raise AuthError when login cannot reach the cloud', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => {
      throw new NetworkError('connection refused');
    });
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await expect(session.ensureValid()).rejects.toBeInstanceOf(AuthError);
  });

  it('should raise AuthError when the response has no token', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => ({
      status: 200,
      body: { success: true, code: 200, data: null },
    }));
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await expect(session.ensureValid()).rejects.toThrow('Login response contained no token');
  });

  it('should let the next caller retry after a failed login', async () => {
    let attempts = 0;
    const transport = new ScriptedTransport().on(API_LOGIN, () => {
      attempts++;
      return attempts === 1 ? { status: 503, body: undefined } : loginOk(makeToken(4102444800));
    });
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    await expect(session.ensureValid()).rejects.toBeInstanceOf(AuthError);
    await expect(session.ensureValid()).resolves.toMatchObject({ token: expect.any(String) });
    expect(attempts).toBe(2);
  });

  it('should log in again once the token is close to expiry', async () => {
    let now = Date.UTC(2025, 9, 1);
    const expSeconds = (now + 10 * DAY_MS) / 1000;
    const transport = new ScriptedTransport().on(API_LOGIN, () => loginOk(makeToken(expSeconds)));
    const session = new AuthSession(credentials, transport, {
      baseUrl: BASE_URL,
      now: () => now,
      logger: silentLogger,
    });

    await session.ensureValid();
    now += 8 * DAY_MS;
    await session.ensureValid();
    expect(transport.count(API_LOGIN)).toBe(1);

    // inside the one-day margin
    now += 1 * DAY_MS + 1;
    await session.ensureValid();
    expect(transport.count(API_LOGIN)).toBe(2);
  });

  it('should only drop the session it was told about', async () => {
    let issued = 0;
    const transport = new ScriptedTransport().on(API_LOGIN, () => {
      issued++;
      return loginOk(makeToken(4102444800, `user-${issued}`));
    });
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    const stale = await session.ensureValid();
    session.invalidate(stale);
    const fresh = await session.ensureValid();

    session.invalidate(stale);
    expect(await session.ensureValid()).toBe(fresh);
    expect(transport.count(API_LOGIN)).toBe(2);
  });

  it('should refuse to log in after close', async () => {
    const transport = new ScriptedTransport().on(API_LOGIN, () => loginOk(makeToken(4102444800)));
    const session = new AuthSession(credentials, transport, { baseUrl: BASE_URL, logger: silentLogger });

    session.close();

    await expect(session.ensureValid()).rejects.toThrow('Session is closed');
    expect(transport.requests).toHaveLength(0);
  });
});

describe('decodeExpiry', () => {
  it('should read the exp claim', () => {
    expect(decodeExpiry(makeToken(4102444800))?.toISOString()).toBe('2100-01-01T00:00:00.000Z');
  });

  it('should return undefined for opaque tokens', () => {
    expect(decodeExpiry('not-a-jwt')).toBeUndefined();
  });
});
