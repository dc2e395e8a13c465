/**
 * Normalized reading model shared by the integrations, the worker and the API.
 *
 * Every measured value is `number | null`: `null` means the cloud did not
 * report the field (or reported something unparsable), never zero.
 */

export type Measured = number | null;

export type PhaseArray = [Measured, Measured, Measured];

export type ProbeArray = [Measured, Measured, Measured, Measured, Measured, Measured];

export type PackArray = [
  Measured,
  Measured,
  Measured,
  Measured,
  Measured,
  Measured,
  Measured,
  Measured,
];

export const PHASE_COUNT = 3;
export const PROBE_COUNT = 6;
export const PACK_COUNT = 8;

// Values are the cloud's wire codes
export enum WorkMode {
  SelfConsumption = 1,
  UserDefined = 2,
  OffGrid = 3,
  BackupPower = 4,
}

export const WORK_MODE_LABELS: Record<WorkMode, string> = {
  [WorkMode.SelfConsumption]: 'Self-consumption',
  [WorkMode.UserDefined]: 'User-defined',
  [WorkMode.OffGrid]: 'Off-grid',
  [WorkMode.BackupPower]: 'Backup power',
};

export type WorkModeName = keyof typeof WorkMode;

export const WORK_MODE_NAMES = [
  'SelfConsumption',
  'UserDefined',
  'OffGrid',
  'BackupPower',
] as const satisfies readonly WorkModeName[];

export function workModeFromCode(code: number): WorkMode | null {
  switch (code) {
    case WorkMode.SelfConsumption:
      return WorkMode.SelfConsumption;
    case WorkMode.UserDefined:
      return WorkMode.UserDefined;
    case WorkMode.OffGrid:
      return WorkMode.OffGrid;
    case WorkMode.BackupPower:
      return WorkMode.BackupPower;
    default:
      return null;
  }
}

export interface InverterEnergyToday {
  solar: Measured;
  gridImport: Measured;
  gridExport: Measured;
  batteryCharge: Measured;
  batteryDischarge: Measured;
  load: Measured;
}

export interface InverterReading {
  serial: string;
  /** When the cloud sampled this data */
  timestamp: Date;
  solarPowerW: Measured;
  loadPowerW: Measured;
  /** Positive = import from grid, negative = export */
  gridPowerW: Measured;
  gridPhasePowerW: PhaseArray;
  /** Negative = charging */
  batteryPowerW: Measured;
  batterySocPct: Measured;
  energyTodayKWh: InverterEnergyToday;
  bmsDesignCapacityKWh: Measured;
  workMode: WorkMode | null;
}

export interface ChargeDischarge {
  charge: Measured;
  discharge: Measured;
}

export interface RelayStates {
  charging: boolean | null;
  discharging: boolean | null;
  negative: boolean | null;
  shunt: boolean | null;
  preCharge: boolean | null;
}

export interface BatteryReading {
  serial: string;
  timestamp: Date;
  socPct: Measured;
  /** Negative = charging */
  powerKW: Measured;
  voltageV: Measured;
  /** Negative = charging */
  currentA: Measured;
  capacityRemainingPct: Measured;
  tempMaxC: Measured;
  tempMinC: Measured;
  probeTempsC: ProbeArray;
  energyTodayKWh: ChargeDischarge;
  energyTotalKWh: ChargeDischarge;
  cycleCount: Measured;
  capacityKWh: Measured;
  packVoltagesV: PackArray;
  packAvgTempsC: PackArray;
  relayStates: RelayStates;
}

export interface CoordinatorSnapshot<TReading> {
  name: string;
  lastReading: TReading | null;
  /** Whether lastReading should be trusted as current */
  available: boolean;
  lastUpdated: Date | null;
  consecutiveFailures: number;
  nextPollAt: Date | null;
  lastError: string | null;
}

export interface WorkModeAck {
  serial: string;
  mode: WorkMode;
  /** Accepted by the cloud; the device applies it within one poll cycle */
  acceptedAt: Date;
}
