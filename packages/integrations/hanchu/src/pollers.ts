import type { BatteryPollerContract, InverterPollerContract } from '@essbridge/integrations-core';
import type { BatteryReading, InverterReading } from '@essbridge/shared-types';
import type { CloudClient } from './cloud-client';
import { API_PARALLEL_POWER_CHART, API_RACK_DATA } from './constants';
import { normalizeBattery, normalizeInverter } from './normalizer';

export class InverterPoller implements InverterPollerContract {
  constructor(
    private readonly client: CloudClient,
    readonly serial: string,
  ) {}

  async poll(signal?: AbortSignal): Promise<InverterReading> {
    const data = await this.client.fetchData(API_PARALLEL_POWER_CHART, { sn: this.serial }, signal);
    return normalizeInverter(data, this.serial);
  }
}

export class BatteryPoller implements BatteryPollerContract {
  constructor(
    private readonly client: CloudClient,
    readonly serial: string,
  ) {}

  async poll(signal?: AbortSignal): Promise<BatteryReading> {
    const data = await this.client.fetchData(API_RACK_DATA, { sn: this.serial }, signal);
    return normalizeBattery(data, this.serial);
  }
}
