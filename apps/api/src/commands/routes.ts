/**
 * Command Routes
 *
 * A 202 means the cloud accepted the write; the new mode shows up in
 * GET /inverter within one poll cycle.
 */

import type { FastifyPluginAsync } from 'fastify';
// route-level rateLimit config
import type {} from '@fastify/rate-limit';
import { z } from 'zod';
import { AdapterErrorType, isAdapterError } from '@essbridge/integrations-core';
import { WORK_MODE_NAMES, WorkMode } from '@essbridge/shared-types';
import type { EssBridge } from '@essbridge/worker';

const setWorkModeSchema = z.object({
  mode: z.enum(WORK_MODE_NAMES),
});

const STATUS_BY_ERROR_TYPE: Record<AdapterErrorType, number> = {
  [AdapterErrorType.AUTH_FAILED]: 502,
  [AdapterErrorType.NETWORK_ERROR]: 502,
  [AdapterErrorType.MALFORMED_PAYLOAD]: 502,
  [AdapterErrorType.REJECTED_BY_DEVICE]: 422,
};

export interface CommandRoutesOptions {
  bridge: EssBridge;
}

export const commandRoutes: FastifyPluginAsync<CommandRoutesOptions> = async (fastify, { bridge }) => {
  /**
   * POST /api/v1/work-mode
   */
  fastify.post('/work-mode', {
    config: {
      rateLimit: {
        max: 10,
        timeWindow: '1 minute',
      },
    },
    handler: async (request, reply) => {
      const parsed = setWorkModeSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: 'Bad Request',
          message: 'Invalid request body',
          details: parsed.error.errors,
        });
      }

      try {
        const ack = await bridge.setWorkMode(WorkMode[parsed.data.mode]);

        return reply.code(202).send({
          mode: parsed.data.mode,
          serial: ack.serial,
          acceptedAt: ack.acceptedAt.toISOString(),
        });
      } catch (error) {
        if (isAdapterError(error)) {
          request.log.warn({ type: error.type }, error.message);
          return reply.code(STATUS_BY_ERROR_TYPE[error.type]).send({
            error: error.name,
            type: error.type,
            message: error.message,
          });
        }

        fastify.log.error(error);
        return reply.code(500).send({
          error: 'Internal Server Error',
          message: 'Failed to set work mode',
        });
      }
    },
  });
};
