export { EssBridge, createBridge } from './bridge';
export type { BatteryCapability, BridgeOptions, CreateBridgeOptions } from './bridge';
export { UpdateCoordinator, DEFAULT_UNAVAILABLE_AFTER_FAILURES } from './coordinator';
export type { CoordinatorPhase, Logger, SnapshotListener, UpdateCoordinatorOptions } from './coordinator';
export { describeConfig, loadConfig } from './config';
export type { BridgeConfig } from './config';
export { createTransport } from './transport';
