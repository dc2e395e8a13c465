import * as fs from 'fs';
import * as path from 'path';
import { NetworkError, describeError } from './contracts';
import { isRawPayload } from './field-parsing';
import type { HttpTransport, TransportRequest, TransportResponse } from './transport';

/**
 * Fixture Transport
 *
 * Mock mode: answers every request from `<fixturesPath>/mock-data.json`,
 * keyed by the request's URL path. NO external API calls.
 */
export class FixtureTransport implements HttpTransport {
  private readonly responses: Map<string, unknown>;
  readonly requests: string[] = [];

  constructor(readonly fixturesPath: string = path.join(process.cwd(), 'fixtures/hanchu')) {
    this.responses = this.loadMockData();
  }

  private loadMockData(): Map<string, unknown> {
    let parsed: unknown;
    try {
      const dataPath = path.join(this.fixturesPath, 'mock-data.json');
      parsed = JSON.parse(fs.readFileSync(dataPath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load mock data from ${this.fixturesPath}: ${describeError(error)}`);
    }

    if (!isRawPayload(parsed) || !isRawPayload(parsed.responses)) {
      throw new Error(`Mock data in ${this.fixturesPath} has no "responses" object`);
    }

    return new Map(Object.entries(parsed.responses));
  }

  async post(request: TransportRequest): Promise<TransportResponse> {
    if (request.signal?.aborted) {
      throw new NetworkError('Request aborted');
    }

    const route = new URL(request.url).pathname;
    this.requests.push(route);

    if (!this.responses.has(route)) {
      return { status: 404, body: undefined };
    }

    return { status: 200, body: structuredClone(this.responses.get(route)) };
  }
}
