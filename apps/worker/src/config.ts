import * as path from 'path';
import { z } from 'zod';
import { createCredentials, type EssCredentials } from '@essbridge/integrations-core';
import { DEFAULT_UNAVAILABLE_AFTER_FAILURES } from './coordinator';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  HANCHU_USERNAME: z.string().min(1, 'HANCHU_USERNAME is required'),
  HANCHU_PASSWORD: z.string().min(1, 'HANCHU_PASSWORD is required'),
  HANCHU_INVERTER_SN: z.string().trim().min(1, 'HANCHU_INVERTER_SN is required'),
  HANCHU_BATTERY_SN: z.string().trim().optional(),
  UNAVAILABLE_AFTER_FAILURES: z.coerce.number().int().positive().default(DEFAULT_UNAVAILABLE_AFTER_FAILURES),
  INTEGRATION_MOCK_MODE: booleanFlag,
  FIXTURES_PATH: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_TOKEN: z.string().optional(),
});

export interface BridgeConfig {
  credentials: EssCredentials;
  unavailableAfterFailures: number;
  mockMode: boolean;
  fixturesPath: string;
  port: number;
  apiToken: string | null;
}

/**
 * Validates process.env; throws with every problem listed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const values = parsed.data;

  return {
    credentials: createCredentials({
      username: values.HANCHU_USERNAME,
      password: values.HANCHU_PASSWORD,
      inverterSerial: values.HANCHU_INVERTER_SN,
      batteryRackSerial: values.HANCHU_BATTERY_SN,
    }),
    unavailableAfterFailures: values.UNAVAILABLE_AFTER_FAILURES,
    mockMode: values.INTEGRATION_MOCK_MODE,
    fixturesPath: values.FIXTURES_PATH || path.join(process.cwd(), 'fixtures/hanchu'),
    port: values.PORT,
    apiToken: values.API_TOKEN || null,
  };
}

/**
 * Startup banner lines; the password never appears
 */
export function describeConfig(config: BridgeConfig): string[] {
  return [
    `Account: ${config.credentials.username} (password: ***)`,
    `Inverter SN: ${config.credentials.inverterSerial}`,
    `Battery SN: ${config.credentials.batteryRackSerial ?? '(none)'}`,
    `Mock Mode: ${config.mockMode}`,
    `Unavailable after: ${config.unavailableAfterFailures} failed polls`,
  ];
}
