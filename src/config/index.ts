import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import Joi from 'joi';
import { ConfigError, errorMessage } from '../errors';
import { EncoderPins, PlcAddress, DataBlockLocation } from '../types/telemetry.types';

dotenv.config();

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

interface EnvVars {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: LogLevel;
}

const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  LOG_LEVEL: Joi.string()
    .lowercase()
    .valid(...LOG_LEVELS)
    .empty(''),
}).unknown();

const { error: envError, value: envVars } = envSchema.validate(process.env);

if (envError) {
  throw new ConfigError(`Environment validation error: ${envError.message}`);
}

export const config = {
  env: envVars.NODE_ENV,
  /** Set from LOG_LEVEL; wins over the config file's log_level. */
  logLevel: envVars.LOG_LEVEL,
};

/** Shape of the JSON config file, keys as operators write them. */
interface GatewayFileConfig {
  host: string;
  port: number;
  send_delay: number;
  log_level: LogLevel;
  mettler_ip?: string;
  mettler_port: number;
  mettler_frequency: number;
  plc_ip?: string;
  plc_rack: number;
  plc_slot: number;
  weight_db?: number;
  weight_start: number;
  meter_db?: number;
  meter_start: number;
  plc_reconnect_interval: number;
  plc_poll_interval: number;
  pin_a?: number;
  pin_b?: number;
  health_port?: number;
  shutdown_timeout: number;
}

const fileSchema = Joi.object<GatewayFileConfig>({
  host: Joi.string().default('0.0.0.0'),
  port: Joi.number().port().default(10001),
  send_delay: Joi.number().min(0).default(0.01),
  log_level: Joi.string()
    .lowercase()
    .valid(...LOG_LEVELS)
    .default('info'),

  mettler_ip: Joi.string().hostname(),
  mettler_port: Joi.number().port().default(1026),
  mettler_frequency: Joi.number().positive().default(100),

  plc_ip: Joi.string().hostname(),
  plc_rack: Joi.number().integer().min(0).default(0),
  plc_slot: Joi.number().integer().min(0).default(1),
  weight_db: Joi.number().integer().min(1),
  weight_start: Joi.number().integer().min(0).default(0),
  meter_db: Joi.number().integer().min(1),
  meter_start: Joi.number().integer().min(0).default(0),
  plc_reconnect_interval: Joi.number().positive().default(5),
  plc_poll_interval: Joi.number().positive().default(0.01),

  pin_a: Joi.number().integer().min(0),
  pin_b: Joi.number().integer().min(0),

  health_port: Joi.number().port(),
  shutdown_timeout: Joi.number().positive().default(2),
})
  .and('pin_a', 'pin_b')
  .unknown();

export interface PlcSettings {
  address: PlcAddress;
  weight?: DataBlockLocation;
  meterCount?: DataBlockLocation;
  reconnectIntervalMs: number;
  pollIntervalMs: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  sendDelayMs: number;
  logLevel: LogLevel;
  shutdownTimeoutMs: number;
  healthPort?: number;
  loadCell?: {
    host: string;
    port: number;
    frequency: number;
  };
  plc?: PlcSettings;
  encoder?: EncoderPins;
}

const seconds = (value: number): number => Math.round(value * 1000);

export function parseGatewayConfig(raw: unknown): GatewayConfig {
  const { error, value } = fileSchema.validate(raw, { abortEarly: false, convert: true });
  if (error) {
    throw new ConfigError(`Config validation error: ${error.message}`);
  }

  const plc: PlcSettings | undefined = value.plc_ip
    ? {
        address: { ip: value.plc_ip, rack: value.plc_rack, slot: value.plc_slot },
        weight:
          value.weight_db !== undefined
            ? { db: value.weight_db, start: value.weight_start }
            : undefined,
        meterCount:
          value.meter_db !== undefined ? { db: value.meter_db, start: value.meter_start } : undefined,
        reconnectIntervalMs: seconds(value.plc_reconnect_interval),
        pollIntervalMs: seconds(value.plc_poll_interval),
      }
    : undefined;

  return {
    host: value.host,
    port: value.port,
    sendDelayMs: seconds(value.send_delay),
    logLevel: config.logLevel ?? value.log_level,
    shutdownTimeoutMs: seconds(value.shutdown_timeout),
    healthPort: value.health_port,
    loadCell: value.mettler_ip
      ? { host: value.mettler_ip, port: value.mettler_port, frequency: value.mettler_frequency }
      : undefined,
    plc,
    encoder:
      value.pin_a !== undefined && value.pin_b !== undefined
        ? { pinA: value.pin_a, pinB: value.pin_b }
        : undefined,
  };
}

export function loadGatewayConfig(configPath: string): GatewayConfig {
  const resolved = path.resolve(configPath.replace(/^~(?=$|\/)/, process.env.HOME ?? '~'));
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new ConfigError(`Config file ${configPath} not found`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseGatewayConfig(raw);
}
