import pino from 'pino';
import { createLogger } from '../utils/logger';
import { NewRelicMetrics } from '../utils/newrelic';
import { isAbortError } from '../utils/async';
import { errorMessage } from '../errors';
import {
  DeviceConnectionState,
  DeviceStatus,
  DeviceWorker,
  Sample,
  WorkerState,
} from '../types/telemetry.types';

/**
 * Lifecycle shared by every device worker: one background task per start, driven by an
 * AbortSignal, whose `close()` always runs however `run()` ends.
 */
export abstract class PollingWorker implements DeviceWorker {
  public readonly name: string;
  protected readonly logger: pino.Logger;
  protected readonly metrics = NewRelicMetrics.getInstance();
  protected state = WorkerState.Idle;
  protected errorCount = 0;
  protected lastError?: string;
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;

  constructor(name: string, moduleName: string) {
    this.name = name;
    this.logger = createLogger(moduleName);
  }

  public start(): void {
    if (this.task) {
      this.logger.warn({ device: this.name }, 'Worker already started');
      return;
    }
    this.controller = new AbortController();
    this.task = this.execute(this.controller.signal);
  }

  public async stop(): Promise<void> {
    if (!this.task) {
      this.setState(WorkerState.Stopped);
      return;
    }
    this.controller?.abort();
    await this.task;
  }

  public terminate(): void {
    this.logger.warn({ device: this.name }, 'Force-closing device connection');
    this.controller?.abort();
    this.release();
  }

  public whenStopped(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  public getStatus(): DeviceStatus {
    const sample = this.currentSample();
    return {
      name: this.name,
      state: this.state,
      connection: this.connectionState(),
      value: sample.value,
      lastSampleAt: sample.sampledAt ?? undefined,
      errorCount: this.errorCount,
      lastError: this.lastError,
    };
  }

  /** Connects and polls until `signal` aborts or the device fails. */
  protected abstract run(signal: AbortSignal): Promise<void>;

  /** Releases the device handle; runs exactly once per start. */
  protected abstract close(): Promise<void>;

  /** Drops the device handle synchronously, interrupting pending I/O. */
  protected abstract release(): void;

  protected abstract currentSample(): Readonly<Sample>;

  protected connectionState(): DeviceConnectionState {
    switch (this.state) {
      case WorkerState.Connecting:
        return DeviceConnectionState.Connecting;
      case WorkerState.Polling:
        return DeviceConnectionState.Connected;
      case WorkerState.Closing:
        return DeviceConnectionState.Stopping;
      default:
        return DeviceConnectionState.Disconnected;
    }
  }

  protected setState(next: WorkerState): void {
    if (this.state === next) return;
    this.logger.debug({ device: this.name, from: this.state, to: next }, 'Worker state changed');
    this.state = next;
  }

  protected recordError(error: unknown): void {
    this.errorCount++;
    this.lastError = errorMessage(error);
    this.metrics.recordDeviceError(
      this.name,
      error instanceof Error ? error : new Error(this.lastError),
    );
  }

  private async execute(signal: AbortSignal): Promise<void> {
    try {
      await this.run(signal);
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.info({ device: this.name }, 'Worker cancelled');
      } else {
        // Device failures stay here: the gateway keeps serving the last good value.
        this.recordError(error);
        this.logger.error({ err: error, device: this.name }, 'Worker stopped after device failure');
      }
    } finally {
      this.setState(WorkerState.Closing);
      try {
        await this.close();
      } catch (error) {
        this.logger.error({ err: error, device: this.name }, 'Failed to release device');
      }
      this.setState(WorkerState.Stopped);
    }
  }
}
