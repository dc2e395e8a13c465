import type { EssAdapter, EssCapabilities, EssCredentials, HttpTransport } from '@essbridge/integrations-core';
import {
  BATTERY_POLL_INTERVAL_SECONDS,
  HanchuAdapter,
  INVERTER_POLL_INTERVAL_SECONDS,
} from '@essbridge/integrations-hanchu';
import type { BatteryReading, InverterReading, WorkMode, WorkModeAck } from '@essbridge/shared-types';
import { UpdateCoordinator, type Logger } from './coordinator';

export type BatteryCapability =
  | { hasBattery: true; serial: string; coordinator: UpdateCoordinator<BatteryReading> }
  | { hasBattery: false };

export interface BridgeOptions {
  unavailableAfterFailures?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Wires one configured system: a coordinator per device poller plus the
 * command entry point. This is everything the host layer gets to see.
 */
export class EssBridge {
  readonly inverter: UpdateCoordinator<InverterReading>;
  readonly battery: BatteryCapability;
  private readonly shutdown = new AbortController();
  private readonly logger: Logger;
  private started = false;

  constructor(
    readonly adapter: EssAdapter,
    options: BridgeOptions = {},
  ) {
    this.logger = options.logger ?? console;

    this.inverter = new UpdateCoordinator({
      name: 'inverter',
      poller: adapter.inverter,
      intervalSeconds: INVERTER_POLL_INTERVAL_SECONDS,
      unavailableAfterFailures: options.unavailableAfterFailures,
      now: options.now,
      logger: options.logger,
    });

    this.battery = adapter.battery
      ? {
          hasBattery: true,
          serial: adapter.battery.serial,
          coordinator: new UpdateCoordinator({
            name: 'battery',
            poller: adapter.battery,
            intervalSeconds: BATTERY_POLL_INTERVAL_SECONDS,
            unavailableAfterFailures: options.unavailableAfterFailures,
            now: options.now,
            logger: options.logger,
          }),
        }
      : { hasBattery: false };
  }

  get hasBattery(): boolean {
    return this.battery.hasBattery;
  }

  get inverterSerial(): string {
    return this.adapter.inverter.serial;
  }

  capabilities(): EssCapabilities {
    return this.adapter.getCapabilities();
  }

  start(): void {
    // stop() is final: the session is closed
    if (this.started || this.shutdown.signal.aborted) return;
    this.started = true;

    this.inverter.start();
    if (this.battery.hasBattery) {
      this.battery.coordinator.start();
    } else {
      this.logger.log('[Bridge] No battery serial configured, battery polling disabled');
    }
  }

  /**
   * Accepted by the cloud is all the ack promises; the inverter coordinator is
   * nudged so the applied mode shows up without waiting for the next tick.
   */
  async setWorkMode(mode: WorkMode): Promise<WorkModeAck> {
    const ack = await this.adapter.commands.setWorkMode(mode, this.shutdown.signal);
    this.logger.log(`[Bridge] Work mode ${ack.mode} accepted for ${ack.serial}`);

    if (this.inverter.isRunning) {
      void this.inverter.refresh();
    }

    return ack;
  }

  stop(): void {
    this.shutdown.abort();
    this.inverter.stop();
    if (this.battery.hasBattery) {
      this.battery.coordinator.stop();
    }
    this.adapter.close();
  }
}

export interface CreateBridgeOptions extends BridgeOptions {
  transport?: HttpTransport;
}

export function createBridge(credentials: EssCredentials, options: CreateBridgeOptions = {}): EssBridge {
  const adapter = new HanchuAdapter(credentials, {
    transport: options.transport,
    now: options.now,
    logger: options.logger,
  });
  return new EssBridge(adapter, options);
}
