import { config as loadEnv } from 'dotenv';
import { WORK_MODE_LABELS } from '@essbridge/shared-types';
import { createBridge, type EssBridge } from './bridge';
import { describeConfig, loadConfig, type BridgeConfig } from './config';
import { createTransport } from './transport';

loadEnv();

let config: BridgeConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error('✗', error instanceof Error ? error.message : error);
  process.exit(1);
}

console.log('============================================');
console.log('ESS Telemetry Bridge Worker');
console.log('============================================');
for (const line of describeConfig(config)) {
  console.log(line);
}
console.log('============================================\n');

// ============================================================================
// WORKER STARTUP
// ============================================================================

let bridge: EssBridge | null = null;

function startWorker(): void {
  try {
    bridge = createBridge(config.credentials, {
      transport: createTransport(config),
      unavailableAfterFailures: config.unavailableAfterFailures,
    });

    bridge.inverter.subscribe((snapshot) => {
      const reading = snapshot.lastReading;
      if (!reading || !snapshot.available) return;
      console.log(
        `[Inverter] solar=${reading.solarPowerW ?? '?'}W load=${reading.loadPowerW ?? '?'}W ` +
          `grid=${reading.gridPowerW ?? '?'}W battery=${reading.batteryPowerW ?? '?'}W ` +
          `soc=${reading.batterySocPct ?? '?'}% mode=${reading.workMode === null ? '?' : WORK_MODE_LABELS[reading.workMode]}`,
      );
    });

    if (bridge.battery.hasBattery) {
      bridge.battery.coordinator.subscribe((snapshot) => {
        const reading = snapshot.lastReading;
        if (!reading || !snapshot.available) return;
        console.log(
          `[Battery] soc=${reading.socPct ?? '?'}% power=${reading.powerKW ?? '?'}kW ` +
            `voltage=${reading.voltageV ?? '?'}V temp=${reading.tempMinC ?? '?'}..${reading.tempMaxC ?? '?'}°C`,
        );
      });
    }

    bridge.start();

    console.log('\n✓ Worker initialization complete');
  } catch (error) {
    console.error('✗ Error starting worker:', error);
    process.exit(1);
  }
}

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

function shutdown(): void {
  console.log('\nShutting down gracefully...');

  bridge?.stop();

  console.log('✓ Shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

startWorker();
