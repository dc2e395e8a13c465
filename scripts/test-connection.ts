/**
 * Verifies credentials and serial numbers against the cloud (or the fixtures
 * in mock mode) with one login and one poll per configured device.
 *
 * Usage: npm run build && npm run test-connection
 */

import { config as loadEnv } from 'dotenv';
import { HanchuAdapter } from '@essbridge/integrations-hanchu';
import { createTransport, describeConfig, loadConfig } from '@essbridge/worker';

loadEnv();

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('🔌 Testing IESS cloud connection...\n');
  for (const line of describeConfig(config)) {
    console.log(`   ${line}`);
  }

  const adapter = new HanchuAdapter(config.credentials, { transport: createTransport(config) });

  try {
    const result = await adapter.testConnection();

    if (result.ok) {
      console.log(`\n✅ ${result.message ?? 'Connection OK'}`);
      return;
    }

    console.error(`\n❌ Connection failed: ${result.message ?? 'unknown error'}`);
    process.exitCode = 1;
  } finally {
    adapter.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
