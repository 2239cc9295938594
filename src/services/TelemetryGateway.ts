import { AddressInfo } from 'net';
import { BroadcastServer } from '../server/BroadcastServer';
import { HealthServer } from './HealthServer';
import { LoadCellWorker } from '../devices/LoadCellWorker';
import { MeterCountWorker } from '../devices/MeterCountWorker';
import { RotaryEncoder } from '../devices/RotaryEncoder';
import { PlcWorker } from '../plc/PlcWorker';
import { ResilientConnector } from '../plc/ResilientConnector';
import { Snap7PlcClient } from '../plc/Snap7PlcClient';
import { DeviceSnapshotSource, RandomSnapshotSource } from '../telemetry/sources';
import { GatewayConfig, config as envConfig } from '../config';
import { createLogger } from '../utils/logger';
import { NewRelicMetrics } from '../utils/newrelic';
import {
  DeviceWorker,
  PlcClient,
  PulseCounter,
  Sample,
  SnapshotReader,
  SnapshotSource,
} from '../types/telemetry.types';

const logger = createLogger('TelemetryGateway');

export interface TelemetryGatewayOptions {
  testMode?: boolean;
  /** Overrides the S7 client, e.g. with an in-process fake. */
  createPlcClient?: (config: NonNullable<GatewayConfig['plc']>) => PlcClient;
  createPulseCounter?: (config: NonNullable<GatewayConfig['encoder']>) => PulseCounter;
}

/**
 * Composition root: builds device workers from the config, joins their cells into one
 * snapshot source and hands everything to the broadcast server.
 */
export class TelemetryGateway {
  private readonly metrics = NewRelicMetrics.getInstance();
  private readonly server: BroadcastServer;
  private readonly workers: DeviceWorker[] = [];
  private readonly source: SnapshotSource;
  private readonly testMode: boolean;
  private healthServer?: HealthServer;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly config: GatewayConfig,
    options: TelemetryGatewayOptions = {},
  ) {
    this.testMode = options.testMode ?? false;
    this.source = this.testMode ? new RandomSnapshotSource() : this.buildDevices(options);

    this.server = new BroadcastServer({
      host: config.host,
      port: config.port,
      sendDelayMs: config.sendDelayMs,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      workerStopTimeoutMs: config.shutdownTimeoutMs,
      source: this.source,
    });
    for (const worker of this.workers) {
      this.server.registerWorker(worker);
    }
  }

  public getServer(): BroadcastServer {
    return this.server;
  }

  public getWorkers(): readonly DeviceWorker[] {
    return this.workers;
  }

  /** Binds the listener first so a taken port fails before any device is touched. */
  public async start(): Promise<AddressInfo> {
    logger.info({ env: envConfig.env, testMode: this.testMode }, 'Starting telemetry gateway');
    if (this.testMode) {
      logger.warn('Test mode: serving random readings, no devices will be contacted');
    }

    const address = await this.server.listen();

    for (const worker of this.workers) {
      worker.start();
    }

    if (this.config.healthPort !== undefined) {
      this.healthServer = new HealthServer(this.config.healthPort, () => ({
        serverState: this.server.getState(),
        sessions: this.server.getSessionCount(),
        testMode: this.testMode,
        devices: this.workers.map((worker) => worker.getStatus()),
      }));
      await this.healthServer.listen();
    }

    this.metrics.recordStartup(this.workers.length, this.testMode);
    logger.info(
      { host: address.address, port: address.port, devices: this.workers.map((w) => w.name) },
      'Gateway started successfully',
    );
    return address;
  }

  public stop(reason = 'requested'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  /** Stops on the first SIGINT or SIGTERM; `onStopped` decides what happens next. */
  public handleSignals(onStopped: () => void): void {
    const handler = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Received shutdown signal');
      this.stop(signal).then(onStopped, (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        onStopped();
      });
    };
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
  }

  private async shutdown(reason: string): Promise<void> {
    logger.info({ reason }, 'Stopping telemetry gateway');
    this.metrics.recordShutdown(reason);
    await this.server.stop();
    await this.healthServer?.close();
    logger.info('Gateway stopped');
  }

  private buildDevices(options: TelemetryGatewayOptions): SnapshotSource {
    let weight: SnapshotReader<Sample> | null = null;
    let meterCount: SnapshotReader<Sample> | null = null;

    const { loadCell, plc, encoder } = this.config;

    if (loadCell) {
      const worker = new LoadCellWorker({ name: 'load-cell', ...loadCell });
      this.workers.push(worker);
      weight = worker.weight;
    }

    if (encoder) {
      const openCounter = options.createPulseCounter ?? ((pins) => new RotaryEncoder(pins));
      const worker = new MeterCountWorker('encoder', () => openCounter(encoder));
      this.workers.push(worker);
      meterCount = worker.meterCount;
    }

    if (plc) {
      // The PLC only fills in what no dedicated device provides
      const plcWeight = weight ? undefined : plc.weight;
      const plcMeter = meterCount ? undefined : plc.meterCount;
      if (plcWeight || plcMeter) {
        const client = options.createPlcClient?.(plc) ?? new Snap7PlcClient(plc.address);
        const connector = new ResilientConnector(client, {
          name: 'plc',
          reconnectIntervalMs: plc.reconnectIntervalMs,
        });
        const worker = new PlcWorker(
          { name: 'plc', weight: plcWeight, meterCount: plcMeter, pollIntervalMs: plc.pollIntervalMs },
          connector,
        );
        this.workers.push(worker);
        weight = plcWeight ? worker.weight : weight;
        meterCount = plcMeter ? worker.meterCount : meterCount;
      } else {
        logger.info('PLC configured but every value has a dedicated device, skipping');
      }
    }

    if (this.workers.length === 0) {
      logger.warn('No devices configured; clients will receive null readings');
    }

    return new DeviceSnapshotSource(weight, meterCount);
  }
}
