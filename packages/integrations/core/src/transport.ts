import { NetworkError, describeError } from './contracts';

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON body; undefined when the body was empty or not JSON */
  body: unknown;
}

/**
 * The only seam between adapters and the network
 */
export interface HttpTransport {
  post(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Links a caller's signal with a per-request timeout.
 * Call dispose() once the request settles.
 */
export function withTimeout(
  parent: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new NetworkError(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs = 30_000) {}

  async post(request: TransportRequest): Promise<TransportResponse> {
    const { signal, dispose } = withTimeout(request.signal, this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal,
      });

      const text = await response.text();
      return { status: response.status, body: parseJson(text) };
    } catch (error) {
      if (signal.reason instanceof NetworkError) {
        throw signal.reason;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      if (cause.name === 'AbortError') {
        throw new NetworkError('Request aborted');
      }
      throw new NetworkError(`Request to ${request.url} failed: ${describeError(cause)}`);
    } finally {
      dispose();
    }
  }
}

function parseJson(text: string): unknown {
  if (!text) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
