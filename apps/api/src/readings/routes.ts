/**
 * Reading Routes
 *
 * Pull side of the consumer interface: coordinator snapshots and capabilities.
 */

import type { FastifyPluginAsync } from 'fastify';
import { WORK_MODE_LABELS, WORK_MODE_NAMES, WorkMode } from '@essbridge/shared-types';
import type { EssBridge } from '@essbridge/worker';

export interface ReadingRoutesOptions {
  bridge: EssBridge;
}

export const readingRoutes: FastifyPluginAsync<ReadingRoutesOptions> = async (fastify, { bridge }) => {
  /**
   * GET /api/v1/capabilities
   */
  fastify.get('/capabilities', async () => {
    return {
      hasBattery: bridge.hasBattery,
      inverterSerial: bridge.inverterSerial,
      batterySerial: bridge.battery.hasBattery ? bridge.battery.serial : null,
      workModes: WORK_MODE_NAMES.map((name) => ({ name, label: WORK_MODE_LABELS[WorkMode[name]] })),
      polling: bridge.capabilities().polling,
    };
  });

  /**
   * GET /api/v1/inverter
   */
  fastify.get('/inverter', async () => {
    return bridge.inverter.snapshot();
  });

  /**
   * GET /api/v1/battery
   *
   * 404 when no battery serial is configured
   */
  fastify.get('/battery', async (request, reply) => {
    if (!bridge.battery.hasBattery) {
      return reply.code(404).send({
        error: 'Not Found',
        message: 'No battery rack configured',
      });
    }

    return bridge.battery.coordinator.snapshot();
  });
};
