/**
 * The single boundary where IESS payloads become typed readings.
 *
 * Per-field problems become null and the reading is still produced. Only a
 * missing or foreign serial, or a missing timestamp, rejects the whole payload.
 */

import {
  MalformedPayloadError,
  clampPercent,
  isRawPayload,
  perThousand,
  readFlag,
  readNumber,
  readSeries,
  readString,
  readTimestamp,
  scale,
  type RawPayload,
} from '@essbridge/integrations-core';
import {
  PACK_COUNT,
  PHASE_COUNT,
  PROBE_COUNT,
  workModeFromCode,
  type BatteryReading,
  type InverterReading,
  type Measured,
  type PackArray,
  type PhaseArray,
  type ProbeArray,
} from '@essbridge/shared-types';
import { BATTERY_POWER_SIGN, GRID_POWER_SIGN } from './constants';

const SERIAL_FIELDS = ['sn', 'deviceSn'];
const TIMESTAMP_FIELDS = ['dataTimeTs', 'dataTime'];

interface Identity {
  serial: string;
  timestamp: Date;
}

function readIdentity(payload: RawPayload, expectedSerial: string, source: string): Identity {
  const serial = SERIAL_FIELDS.map((field) => readString(payload, field)).find((value) => value !== null);

  if (!serial) {
    throw new MalformedPayloadError(`${source} payload has no device serial`);
  }
  if (serial !== expectedSerial) {
    throw new MalformedPayloadError(`${source} payload is for ${serial}, expected ${expectedSerial}`);
  }

  const timestamp = readTimestamp(payload, ...TIMESTAMP_FIELDS);
  if (!timestamp) {
    throw new MalformedPayloadError(`${source} payload has no sample timestamp`);
  }

  return { serial, timestamp };
}

function toPhases(values: Measured[]): PhaseArray {
  return [values[0] ?? null, values[1] ?? null, values[2] ?? null];
}

function toProbes(values: Measured[]): ProbeArray {
  return [
    values[0] ?? null,
    values[1] ?? null,
    values[2] ?? null,
    values[3] ?? null,
    values[4] ?? null,
    values[5] ?? null,
  ];
}

function toPacks(values: Measured[]): PackArray {
  return [
    values[0] ?? null,
    values[1] ?? null,
    values[2] ?? null,
    values[3] ?? null,
    values[4] ?? null,
    values[5] ?? null,
    values[6] ?? null,
    values[7] ?? null,
  ];
}

/**
 * parallelPowerChart → InverterReading. Accepts either the full `data` object
 * or its `mainPower` member.
 */
export function normalizeInverter(raw: unknown, expectedSerial: string): InverterReading {
  if (!isRawPayload(raw)) {
    throw new MalformedPayloadError('Inverter payload is not an object');
  }
  const payload = isRawPayload(raw.mainPower) ? raw.mainPower : raw;
  const { serial, timestamp } = readIdentity(payload, expectedSerial, 'Inverter');

  const workModeCode = readNumber(payload, 'workMode');

  return {
    serial,
    timestamp,
    solarPowerW: readNumber(payload, 'pvTtPwr'),
    loadPowerW: readNumber(payload, 'loadPwr'),
    gridPowerW: scale(readNumber(payload, 'pwrGridSum'), GRID_POWER_SIGN),
    gridPhasePowerW: toPhases(
      readSeries(payload, PHASE_COUNT, (n) => `pwrL${n}Grid`).map((value) => scale(value, GRID_POWER_SIGN)),
    ),
    batteryPowerW: scale(readNumber(payload, 'batP'), BATTERY_POWER_SIGN),
    // batSoc is a 0-1 fraction
    batterySocPct: clampPercent(scale(readNumber(payload, 'batSoc'), 100)),
    energyTodayKWh: {
      solar: readNumber(payload, 'pvDge'),
      gridImport: readNumber(payload, 'gridTdEe'),
      gridExport: readNumber(payload, 'gridTdFe'),
      batteryCharge: readNumber(payload, 'batTdChg'),
      batteryDischarge: readNumber(payload, 'batTdDschg'),
      load: readNumber(payload, 'loadTdEe'),
    },
    bmsDesignCapacityKWh: readNumber(payload, 'bmsDesignCap'),
    workMode: workModeCode === null ? null : workModeFromCode(Math.trunc(workModeCode)),
  };
}

/**
 * queryRackDataDivisions → BatteryReading
 */
export function normalizeBattery(raw: unknown, expectedSerial: string): BatteryReading {
  if (!isRawPayload(raw)) {
    throw new MalformedPayloadError('Battery payload is not an object');
  }
  const { serial, timestamp } = readIdentity(raw, expectedSerial, 'Battery');

  return {
    serial,
    timestamp,
    socPct: clampPercent(readNumber(raw, 'rackSoc')),
    // rackPwr is W
    powerKW: perThousand(scale(readNumber(raw, 'rackPwr'), BATTERY_POWER_SIGN)),
    voltageV: readNumber(raw, 'rackTotalV'),
    currentA: scale(readNumber(raw, 'rackTotalA'), BATTERY_POWER_SIGN),
    capacityRemainingPct: clampPercent(readNumber(raw, 'rackCapRemain')),
    tempMaxC: readNumber(raw, 'maxT'),
    tempMinC: readNumber(raw, 'minT'),
    probeTempsC: toProbes(readSeries(raw, PROBE_COUNT, (n) => `rackT${n}`)),
    energyTodayKWh: {
      charge: readNumber(raw, 'rackTodayCharge'),
      discharge: readNumber(raw, 'rackTodayDischarge'),
    },
    energyTotalKWh: {
      charge: readNumber(raw, 'rackTotalCharge'),
      discharge: readNumber(raw, 'rackTotalDischarge'),
    },
    cycleCount: readNumber(raw, 'rackTotalLoopNum'),
    capacityKWh: readNumber(raw, 'rackCapacity'),
    packVoltagesV: toPacks(readSeries(raw, PACK_COUNT, (n) => `pack${n}V`)),
    packAvgTempsC: toPacks(readSeries(raw, PACK_COUNT, (n) => `pack${n}AvgT`)),
    relayStates: {
      charging: readFlag(raw, 'chargingRelay'),
      discharging: readFlag(raw, 'dischargingRelay'),
      negative: readFlag(raw, 'negRelay'),
      shunt: readFlag(raw, 'shuntRelay'),
      preCharge: readFlag(raw, 'preChargeRelay'),
    },
  };
}
