import { config as loadEnv } from 'dotenv';
import { createBridge, createTransport, describeConfig, loadConfig, type BridgeConfig } from '@essbridge/worker';
import { buildServer } from './server';

loadEnv();

// Validate configuration at startup
let config: BridgeConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error('✗', error instanceof Error ? error.message : error);
  process.exit(1);
}

for (const line of describeConfig(config)) {
  console.log(line);
}

const bridge = createBridge(config.credentials, {
  transport: createTransport(config),
  unavailableAfterFailures: config.unavailableAfterFailures,
});

const start = async () => {
  const fastify = await buildServer(bridge, { apiToken: config.apiToken });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    bridge.stop();
    await fastify.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await fastify.listen({ port: config.port, host: '0.0.0.0' });
    bridge.start();
    console.log(`✓ API server running on http://localhost:${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    bridge.stop();
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  console.error('✗ Error starting API server:', error);
  bridge.stop();
  process.exit(1);
});
