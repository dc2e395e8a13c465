/**
 * ESS Integration Contracts
 *
 * All vendor adapters MUST implement these interfaces
 */

import type { BatteryReading, InverterReading, WorkMode, WorkModeAck } from '@essbridge/shared-types';

// ============================================================================
// CREDENTIALS
// ============================================================================

export interface EssCredentials {
  readonly username: string;
  readonly password: string;
  readonly inverterSerial: string;
  /** Absent = no battery rack; the battery subsystem is disabled */
  readonly batteryRackSerial?: string;
}

/**
 * Freezes credentials and drops a blank battery serial
 */
export function createCredentials(input: {
  username: string;
  password: string;
  inverterSerial: string;
  batteryRackSerial?: string | null;
}): EssCredentials {
  const batteryRackSerial = input.batteryRackSerial?.trim();

  return Object.freeze({
    username: input.username,
    password: input.password,
    inverterSerial: input.inverterSerial.trim(),
    ...(batteryRackSerial ? { batteryRackSerial } : {}),
  });
}

// ============================================================================
// DEVICE CONTRACTS
// ============================================================================

export interface DevicePoller<TReading> {
  readonly serial: string;
  poll(signal?: AbortSignal): Promise<TReading>;
}

export type InverterPollerContract = DevicePoller<InverterReading>;
export type BatteryPollerContract = DevicePoller<BatteryReading>;

export interface WorkModeCommander {
  setWorkMode(mode: WorkMode, signal?: AbortSignal): Promise<WorkModeAck>;
}

// ============================================================================
// ADAPTER INTERFACE
// ============================================================================

export interface EssAdapter {
  readonly inverter: InverterPollerContract;
  /** null when no battery serial was configured */
  readonly battery: BatteryPollerContract | null;
  readonly commands: WorkModeCommander;

  /**
   * Verify credentials and serial numbers with one round of requests
   */
  testConnection(signal?: AbortSignal): Promise<TestConnectionResult>;

  /**
   * Get adapter capabilities (cadence, features)
   */
  getCapabilities(): EssCapabilities;

  /**
   * Drop the session; no further logins are attempted
   */
  close(): void;
}

export interface TestConnectionResult {
  ok: boolean;
  message?: string;
  inverterSerial: string;
  batterySerial?: string;
}

export interface EssCapabilities {
  brand: 'HANCHU';

  polling: {
    inverterIntervalSeconds: number;
    batteryIntervalSeconds: number;
    requestTimeoutSeconds: number;
  };

  features: {
    hasBattery: boolean;
    supportsWorkModeWrite: boolean;
  };
}

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum AdapterErrorType {
  AUTH_FAILED = 'AUTH_FAILED',
  NETWORK_ERROR = 'NETWORK_ERROR',
  MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',
  REJECTED_BY_DEVICE = 'REJECTED_BY_DEVICE',
}

export class AdapterError extends Error {
  constructor(
    public type: AdapterErrorType,
    message: string,
    public httpStatus?: number,
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}

/** Credentials rejected, or the session was rejected mid-call */
export class AuthError extends AdapterError {
  constructor(message: string, httpStatus?: number) {
    super(AdapterErrorType.AUTH_FAILED, message, httpStatus);
    this.name = 'AuthError';
  }
}

/** Timeout, connection failure, non-2xx or unusable response */
export class NetworkError extends AdapterError {
  constructor(message: string, httpStatus?: number) {
    super(AdapterErrorType.NETWORK_ERROR, message, httpStatus);
    this.name = 'NetworkError';
  }
}

/** Response parsed but identity or timestamp is missing */
export class MalformedPayloadError extends AdapterError {
  constructor(message: string) {
    super(AdapterErrorType.MALFORMED_PAYLOAD, message);
    this.name = 'MalformedPayloadError';
  }
}

/** The cloud accepted the HTTP call but refused the command */
export class RejectedByDeviceError extends AdapterError {
  constructor(message: string, httpStatus?: number) {
    super(AdapterErrorType.REJECTED_BY_DEVICE, message, httpStatus);
    this.name = 'RejectedByDeviceError';
  }
}

export function isAdapterError(error: unknown): error is AdapterError {
  return error instanceof AdapterError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
