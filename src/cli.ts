#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import { parseArgs } from 'util';
import { ShiftBridge } from './bridge.js';
import { BridgeState } from './state-machine.js';
import { loadConfig, type AppConfig } from './config.js';
import { formatScannedDevice } from './device-connector.js';
import { ConfigurationError } from './errors.js';
import { Logger } from './logger.js';
import { NobleConnector } from './noble-connector.js';
import { describeError, getPackageMetadata } from './utils.js';

// Load .env.local if it exists
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

const DEFAULT_SCAN_SECONDS = 15;

function usage(): string {
  const { name, description } = getPackageMetadata();
  return [
    `${name} - ${description}`,
    '',
    `Usage: ${name} [options]`,
    '',
    'Options:',
    '  -c, --config PATH   Configuration file (default: ./config.json, or $VSHIFT_CONFIG)',
    '  -v, --verbose       Debug logging',
    `      --scan [SECS]   List nearby Bluetooth devices and exit (default: ${DEFAULT_SCAN_SECONDS}s)`,
    '  -h, --help          Show this help',
    '      --version       Print the version',
    '',
    'Environment:',
    '  VSHIFT_LOG_LEVEL        debug | info | warn | error (default: info)',
    '  VSHIFT_LOG_TIMESTAMPS   set to false to drop timestamps'
  ].join('\n');
}

async function main(): Promise<number> {
  let args: { config?: string; verbose?: boolean; help?: boolean; version?: boolean; scan?: boolean };
  let positionals: string[];
  try {
    const parsed = parseArgs({
      options: {
        config: { type: 'string', short: 'c' },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', default: false },
        scan: { type: 'boolean', default: false }
      },
      allowPositionals: true,
      strict: true
    });
    args = parsed.values;
    positionals = parsed.positionals;
  } catch (error) {
    console.error(describeError(error));
    console.error(usage());
    return 1;
  }

  if (args.help) {
    console.log(usage());
    return 0;
  }
  if (args.version) {
    console.log(getPackageMetadata().version);
    return 0;
  }
  if (args.verbose) {
    Logger.setLevelOverride('debug');
  }

  const logger = new Logger('Main');

  if (args.scan) {
    const seconds = positionals.length > 0 ? Number(positionals[0]) : DEFAULT_SCAN_SECONDS;
    if (!Number.isFinite(seconds) || seconds <= 0) {
      console.error(`Invalid scan duration: ${positionals[0]}`);
      return 1;
    }
    return scanDevices(seconds, logger);
  }
  if (positionals.length > 0) {
    console.error(`Unexpected argument: ${positionals[0]}`);
    console.error(usage());
    return 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig(args.config ?? process.env.VSHIFT_CONFIG);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  logger.info('🚴 Starting virtual shifting');
  logger.info(`   Trainer: '${config.bluetooth.trainerName}'`);
  logger.info(`   Controllers: '${config.bluetooth.leftControllerName}' (left), '${config.bluetooth.rightControllerName}' (right)`);
  logger.info(`   Gears: ${config.gears.minGear}-${config.gears.maxGear}, starting at ${config.gears.currentGear}`);

  const bridge = new ShiftBridge({ config, connector: new NobleConnector() });

  process.on('unhandledRejection', (reason) => {
    logger.error('[CRITICAL] Unhandled promise rejection:', reason);
  });
  process.on('uncaughtException', (error) => {
    logger.error('[CRITICAL] Uncaught exception:', error);
  });

  const shutdown = (signal: string) => {
    logger.info(`\n👋 ${signal} received, shutting down...`);
    bridge.stop().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${describeError(error)}`);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await bridge.start();
  } catch (error) {
    logger.error(`❌ Could not connect all devices: ${describeError(error)}`);
    return 1;
  }

  // start() also returns when a signal stopped the bridge mid-discovery
  if (bridge.getState() !== BridgeState.TERMINATED) {
    logger.info('Use the controllers to shift gears, Ctrl+C to quit');
  }

  try {
    await bridge.waitForTermination();
  } catch (error) {
    logger.error(`❌ Stopped: ${describeError(error)}`);
    return 1;
  }

  logger.info('✅ Disconnected, goodbye');
  return 0;
}

async function scanDevices(seconds: number, logger: Logger): Promise<number> {
  const connector = new NobleConnector();
  try {
    const devices = await connector.scan(seconds);
    if (devices.length === 0) {
      console.log('No devices found');
    }
    for (const device of devices) {
      console.log(formatScannedDevice(device));
    }
    return 0;
  } catch (error) {
    logger.error(`❌ Scan failed: ${describeError(error)}`);
    return 1;
  } finally {
    await connector.shutdown();
  }
}

main().then(
  code => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  }
);
