import {
  AuthError,
  NetworkError,
  describeError,
  isAdapterError,
  type AdapterError,
  type DevicePoller,
} from '@essbridge/integrations-core';
import type { CoordinatorSnapshot } from '@essbridge/shared-types';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type CoordinatorPhase = 'idle' | 'polling' | 'success' | 'failure';

export type SnapshotListener<TReading> = (snapshot: CoordinatorSnapshot<TReading>) => void;

export const DEFAULT_UNAVAILABLE_AFTER_FAILURES = 3;

export interface UpdateCoordinatorOptions<TReading> {
  name: string;
  poller: DevicePoller<TReading>;
  intervalSeconds: number;
  /** Consecutive failed polls before the reading is flagged unavailable */
  unavailableAfterFailures?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Update Coordinator
 *
 * Owns one poller's schedule and its last good reading. A tick never starts a
 * poll while the previous one is still outstanding; failures only move the
 * counters and the availability flag, never the reading.
 */
export class UpdateCoordinator<TReading> {
  readonly name: string;
  private readonly poller: DevicePoller<TReading>;
  private readonly intervalSeconds: number;
  private readonly threshold: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private lastReading: TReading | null = null;
  private available = false;
  private lastUpdated: Date | null = null;
  private consecutiveFailures = 0;
  private consecutiveAuthFailures = 0;
  private lastError: string | null = null;
  private nextPollAt: Date | null = null;
  private phase: CoordinatorPhase = 'idle';

  private intervalId: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  // Bumped on stop() so a late outcome from an abandoned poll is dropped
  private generation = 0;
  private readonly listeners = new Set<SnapshotListener<TReading>>();

  constructor(options: UpdateCoordinatorOptions<TReading>) {
    this.name = options.name;
    this.poller = options.poller;
    this.intervalSeconds = options.intervalSeconds;
    this.threshold = options.unavailableAfterFailures ?? DEFAULT_UNAVAILABLE_AFTER_FAILURES;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
  }

  /**
   * Poll now, then every interval
   */
  start(): void {
    if (this.intervalId) {
      this.logger.log(`[Coordinator:${this.name}] Already running`);
      return;
    }

    this.logger.log(`[Coordinator:${this.name}] Starting (polling every ${this.intervalSeconds}s)`);

    this.intervalId = setInterval(() => {
      this.tick();
    }, this.intervalSeconds * 1000);

    this.tick();
  }

  /**
   * Cancel the timer and abandon any in-flight poll without waiting for it
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    this.generation++;
    this.abortController?.abort(new NetworkError(`${this.name} coordinator stopped`));
    this.abortController = null;
    this.inFlight = null;
    this.nextPollAt = null;
    this.phase = 'idle';

    this.logger.log(`[Coordinator:${this.name}] Stopped`);
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  get state(): CoordinatorPhase {
    return this.phase;
  }

  /**
   * Run one cycle now. Joins the in-flight poll instead of starting another.
   */
  refresh(): Promise<void> {
    return this.inFlight ?? this.runCycle();
  }

  snapshot(): CoordinatorSnapshot<TReading> {
    return {
      name: this.name,
      lastReading: this.lastReading,
      available: this.available,
      lastUpdated: this.lastUpdated,
      consecutiveFailures: this.consecutiveFailures,
      nextPollAt: this.nextPollAt,
      lastError: this.lastError,
    };
  }

  subscribe(listener: SnapshotListener<TReading>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private tick(): void {
    this.nextPollAt = new Date(this.now() + this.intervalSeconds * 1000);

    if (this.inFlight) {
      this.logger.warn(`[Coordinator:${this.name}] Previous poll still running, skipping tick`);
      return;
    }

    void this.runCycle();
  }

  private runCycle(): Promise<void> {
    const generation = this.generation;
    const controller = new AbortController();
    this.abortController = controller;
    this.phase = 'polling';

    const cycle: Promise<void> = this.poller
      .poll(controller.signal)
      .then(
        (reading) => {
          if (generation === this.generation) this.handleSuccess(reading);
        },
        (error: unknown) => {
          if (generation === this.generation) this.handleFailure(error);
        },
      )
      .finally(() => {
        if (this.inFlight === cycle) {
          this.inFlight = null;
          this.abortController = null;
        }
      });

    this.inFlight = cycle;
    return cycle;
  }

  private handleSuccess(reading: TReading): void {
    const wasUnavailable = !this.available && this.consecutiveFailures > 0;

    this.lastReading = reading;
    this.lastUpdated = new Date(this.now());
    this.available = true;
    this.consecutiveFailures = 0;
    this.consecutiveAuthFailures = 0;
    this.lastError = null;
    this.phase = 'success';

    if (wasUnavailable) {
      this.logger.log(`[Coordinator:${this.name}] ✓ Recovered`);
    }

    this.notify();
  }

  private handleFailure(error: unknown): void {
    const failure: AdapterError = isAdapterError(error) ? error : new NetworkError(describeError(error));

    // The first AuthError of a streak gets a free re-login on the next tick
    if (failure instanceof AuthError) {
      this.consecutiveAuthFailures++;
      if (this.consecutiveAuthFailures > 1) {
        this.consecutiveFailures++;
      }
    } else {
      this.consecutiveAuthFailures = 0;
      this.consecutiveFailures++;
    }

    this.lastError = `${failure.name}: ${failure.message}`;
    this.phase = 'failure';

    this.logger.error(
      `[Coordinator:${this.name}] ✗ Poll failed (${this.consecutiveFailures}/${this.threshold}): ${this.lastError}`,
    );

    if (this.available && this.consecutiveFailures >= this.threshold) {
      this.available = false;
      this.logger.warn(`[Coordinator:${this.name}] Marked unavailable, keeping last reading`);
    }

    this.notify();
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error(`[Coordinator:${this.name}] Listener failed:`, error);
      }
    }
  }
}
