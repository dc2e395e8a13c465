import {
  FetchTransport,
  describeError,
  type EssAdapter,
  type EssCapabilities,
  type EssCredentials,
  type HttpTransport,
  type TestConnectionResult,
} from '@essbridge/integrations-core';
import { AuthSession, type Logger } from './auth-session';
import { CloudClient } from './cloud-client';
import { CommandDispatcher } from './command-dispatcher';
import {
  API_BASE,
  BATTERY_POLL_INTERVAL_SECONDS,
  INVERTER_POLL_INTERVAL_SECONDS,
  REQUEST_TIMEOUT_SECONDS,
} from './constants';
import { BatteryPoller, InverterPoller } from './pollers';

export const HANCHU_ADAPTER_VERSION = '0.1.0';

export interface HanchuAdapterOptions {
  transport?: HttpTransport;
  baseUrl?: string;
  now?: () => number;
  logger?: Logger;
}

/**
 * Hanchu IESS cloud adapter
 *
 * One shared session for the inverter poller, the battery poller (only when a
 * rack serial is configured) and the command dispatcher.
 */
export class HanchuAdapter implements EssAdapter {
  readonly session: AuthSession;
  readonly inverter: InverterPoller;
  readonly battery: BatteryPoller | null;
  readonly commands: CommandDispatcher;

  constructor(
    readonly credentials: EssCredentials,
    options: HanchuAdapterOptions = {},
  ) {
    const transport = options.transport ?? new FetchTransport(REQUEST_TIMEOUT_SECONDS * 1000);
    const baseUrl = options.baseUrl ?? API_BASE;

    this.session = new AuthSession(credentials, transport, {
      baseUrl,
      now: options.now,
      logger: options.logger,
    });
    const client = new CloudClient(this.session, transport, baseUrl);

    this.inverter = new InverterPoller(client, credentials.inverterSerial);
    this.battery = credentials.batteryRackSerial
      ? new BatteryPoller(client, credentials.batteryRackSerial)
      : null;
    this.commands = new CommandDispatcher(client, credentials.inverterSerial, options.now);
  }

  async testConnection(signal?: AbortSignal): Promise<TestConnectionResult> {
    const result: TestConnectionResult = {
      ok: false,
      inverterSerial: this.credentials.inverterSerial,
      batterySerial: this.credentials.batteryRackSerial,
    };

    try {
      await this.session.ensureValid(signal);
      await this.inverter.poll(signal);
      if (this.battery) {
        await this.battery.poll(signal);
      }
    } catch (error) {
      return { ...result, message: describeError(error) };
    }

    return {
      ...result,
      ok: true,
      message: this.battery ? 'Inverter and battery rack reachable' : 'Inverter reachable',
    };
  }

  getCapabilities(): EssCapabilities {
    return {
      brand: 'HANCHU',
      polling: {
        inverterIntervalSeconds: INVERTER_POLL_INTERVAL_SECONDS,
        batteryIntervalSeconds: BATTERY_POLL_INTERVAL_SECONDS,
        requestTimeoutSeconds: REQUEST_TIMEOUT_SECONDS,
      },
      features: {
        hasBattery: this.battery !== null,
        supportsWorkModeWrite: true,
      },
    };
  }

  close(): void {
    this.session.close();
  }
}

export { AuthSession, decodeExpiry } from './auth-session';
export type { Logger, Session, AuthSessionOptions } from './auth-session';
export { CloudClient } from './cloud-client';
export { CommandDispatcher } from './command-dispatcher';
export { BatteryPoller, InverterPoller } from './pollers';
export { normalizeBattery, normalizeInverter } from './normalizer';
export { aesDecrypt, aesEncrypt, rsaEncrypt } from './envelope';
export * from './constants';
