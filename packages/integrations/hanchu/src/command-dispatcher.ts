import { Mutex } from 'async-mutex';
import { RejectedByDeviceError, type WorkModeCommander } from '@essbridge/integrations-core';
import { WORK_MODE_LABELS, workModeFromCode, type WorkMode, type WorkModeAck } from '@essbridge/shared-types';
import { responseMessage, type CloudClient } from './cloud-client';
import { API_SET_WORK_MODE } from './constants';

/**
 * Work-mode writes. Each call is sent as-is, in call order, never retried;
 * an ack means the cloud accepted it, the device applies it later.
 */
export class CommandDispatcher implements WorkModeCommander {
  private readonly writeLock = new Mutex();

  constructor(
    private readonly client: CloudClient,
    private readonly inverterSerial: string,
    private readonly now: () => number = Date.now,
  ) {}

  async setWorkMode(mode: WorkMode, signal?: AbortSignal): Promise<WorkModeAck> {
    const code = workModeFromCode(mode);
    if (code === null) {
      throw new RejectedByDeviceError(`Unsupported work mode: ${String(mode)}`);
    }

    return this.writeLock.runExclusive(async () => {
      const body = await this.client.post(API_SET_WORK_MODE, { sn: this.inverterSerial, workMode: code }, signal);

      if (body.success !== true) {
        throw new RejectedByDeviceError(
          `Work mode ${WORK_MODE_LABELS[code]} refused: ${responseMessage(body)}`,
        );
      }

      return { serial: this.inverterSerial, mode: code, acceptedAt: new Date(this.now()) };
    });
  }
}
