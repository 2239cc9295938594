#!/usr/bin/env node
import 'newrelic';
import * as fs from 'fs';
import * as path from 'path';
import { ArgumentParser } from 'argparse';
import { TelemetryGateway } from './services/TelemetryGateway';
import { loadGatewayConfig } from './config';
import { BindError, ConfigError } from './errors';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('Main');

export interface CliArgs {
  configFile: string;
  testMode: boolean;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'),
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return 'unknown';
}

export function parseCliArgs(argv: string[]): CliArgs {
  const parser = new ArgumentParser({
    prog: 'telemetry-gateway',
    description: 'Streams load cell, PLC and encoder readings to TCP clients as JSON lines',
  });

  parser.add_argument('config_file', {
    help: 'Path to the JSON configuration file',
  });

  parser.add_argument('-t', '--test_mode', {
    action: 'store_true',
    help: 'Serve random readings instead of polling devices',
  });

  parser.add_argument('-v', '--version', {
    action: 'version',
    version: readVersion(),
  });

  const args: { config_file: string; test_mode: boolean } = parser.parse_args(argv);
  return {
    configFile: args.config_file,
    testMode: args.test_mode,
  };
}

function createGateway(args: CliArgs): TelemetryGateway {
  try {
    const gatewayConfig = loadGatewayConfig(args.configFile);
    setLogLevel(gatewayConfig.logLevel);
    return new TelemetryGateway(gatewayConfig, { testMode: args.testMode });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ err: error }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const gateway = createGateway(args);

  try {
    await gateway.start();
  } catch (error) {
    if (error instanceof BindError) {
      logger.fatal({ err: error }, 'Failed to start server');
    } else {
      logger.fatal({ err: error }, 'Failed to start service');
    }
    await gateway.stop('startup failure');
    process.exit(1);
  }

  gateway.handleSignals(() => process.exit(0));
}

if (require.main === module) {
  main().catch((error) => {
    logger.fatal({ err: error }, 'Unhandled error');
    process.exit(1);
  });
}

export { TelemetryGateway };
