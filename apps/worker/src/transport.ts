import { FetchTransport, FixtureTransport, type HttpTransport } from '@essbridge/integrations-core';
import { REQUEST_TIMEOUT_SECONDS } from '@essbridge/integrations-hanchu';
import type { BridgeConfig } from './config';

export function createTransport(config: Pick<BridgeConfig, 'mockMode' | 'fixturesPath'>): HttpTransport {
  if (config.mockMode) {
    return new FixtureTransport(config.fixturesPath);
  }
  return new FetchTransport(REQUEST_TIMEOUT_SECONDS * 1000);
}
