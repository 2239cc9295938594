import { createLogger } from '../utils/logger';
import { NewRelicMetrics } from '../utils/newrelic';
import { Mutex } from '../utils/Mutex';
import { isAbortError, sleep } from '../utils/async';
import { errorMessage } from '../errors';
import { DeviceConnectionState, PlcClient } from '../types/telemetry.types';

const DEFAULT_RECONNECT_INTERVAL_MS = 5000;

export interface ResilientConnectorOptions {
  name: string;
  reconnectIntervalMs?: number;
  /** Lock shared by foreground calls and the reconnection loop. */
  mutex?: Mutex;
}

/**
 * Keeps a PLC session alive across faults. Every touch of the client, foreground or
 * background, goes through one mutex; no method throws. Reads and writes issued while
 * disconnected fail fast instead of waiting for the next reconnect.
 */
export class ResilientConnector {
  private readonly logger = createLogger('ResilientConnector');
  private readonly metrics = NewRelicMetrics.getInstance();
  private readonly name: string;
  private readonly reconnectIntervalMs: number;
  private readonly mutex: Mutex;
  private state = DeviceConnectionState.Disconnected;
  private stopRequested = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private errorCount = 0;
  private lastError?: string;

  constructor(
    private readonly client: PlcClient,
    options: ResilientConnectorOptions,
  ) {
    this.name = options.name;
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? DEFAULT_RECONNECT_INTERVAL_MS;
    this.mutex = options.mutex ?? new Mutex();
  }

  public getState(): DeviceConnectionState {
    return this.state;
  }

  public getErrorCount(): number {
    return this.errorCount;
  }

  public getLastError(): string | undefined {
    return this.lastError;
  }

  /** One connection attempt. */
  public async connect(): Promise<boolean> {
    if (this.stopRequested) {
      return false;
    }
    return this.mutex.runExclusive(() => this.connectLocked());
  }

  /** Asks the client whether it is alive and corrects the cached state if the two disagree. */
  public async isConnected(): Promise<boolean> {
    if (this.stopRequested) {
      return false;
    }
    return this.mutex.runExclusive(() => this.checkLivenessLocked());
  }

  public async readBlock(db: number, offset: number, size: number): Promise<Buffer | null> {
    if (this.stopRequested || this.state !== DeviceConnectionState.Connected) {
      return null;
    }
    return this.mutex.runExclusive(async () => {
      if (this.state !== DeviceConnectionState.Connected) {
        return null;
      }
      try {
        return await this.client.dbRead(db, offset, size);
      } catch (error) {
        this.markDisconnected(error, 'read');
        return null;
      }
    });
  }

  public async writeBlock(db: number, offset: number, data: Buffer): Promise<boolean> {
    if (this.stopRequested || this.state !== DeviceConnectionState.Connected) {
      return false;
    }
    return this.mutex.runExclusive(async () => {
      if (this.state !== DeviceConnectionState.Connected) {
        return false;
      }
      try {
        await this.client.dbWrite(db, offset, data);
        return true;
      } catch (error) {
        this.markDisconnected(error, 'write');
        return false;
      }
    });
  }

  /** Starts the background reconnection loop; later calls are no-ops. */
  public start(): void {
    if (this.loop || this.stopRequested) {
      return;
    }
    this.controller = new AbortController();
    this.loop = this.superviseConnection(this.controller.signal);
  }

  public stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.stopRequested = true;
    this.state = DeviceConnectionState.Stopping;
    this.controller?.abort();
    await this.loop;

    await this.mutex.runExclusive(async () => {
      try {
        await this.client.disconnect();
      } catch (error) {
        this.logger.warn({ err: error, device: this.name }, 'Error while disconnecting PLC');
      }
      this.state = DeviceConnectionState.Disconnected;
    });
    this.logger.info({ device: this.name }, 'PLC connector stopped');
  }

  private async superviseConnection(signal: AbortSignal): Promise<void> {
    this.logger.info(
      { device: this.name, intervalMs: this.reconnectIntervalMs },
      'PLC reconnection loop started',
    );
    try {
      while (!signal.aborted) {
        if (this.state !== DeviceConnectionState.Connected) {
          await sleep(this.reconnectIntervalMs, signal);
          this.logger.info({ device: this.name }, 'Attempting to reconnect to PLC');
          await this.connect();
        } else {
          await this.isConnected();
          await sleep(this.reconnectIntervalMs, signal);
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        this.logger.error({ err: error, device: this.name }, 'PLC reconnection loop failed');
      }
    }
  }

  private async connectLocked(): Promise<boolean> {
    if (this.stopRequested) {
      return false;
    }
    if (this.state === DeviceConnectionState.Connected) {
      return true;
    }

    this.state = DeviceConnectionState.Connecting;
    try {
      await this.client.connect();
    } catch (error) {
      this.state = DeviceConnectionState.Disconnected;
      this.recordError(error);
      this.logger.warn({ err: error, device: this.name }, 'Failed to connect to PLC');
      return false;
    }

    if (this.stopRequested) {
      return false;
    }
    this.state = DeviceConnectionState.Connected;
    this.metrics.recordDeviceConnection(this.name, true);
    this.logger.info({ device: this.name }, 'PLC connected');
    return true;
  }

  private checkLivenessLocked(): boolean {
    let alive: boolean;
    try {
      alive = this.client.isConnected();
    } catch (error) {
      this.logger.debug({ err: error, device: this.name }, 'PLC liveness check threw');
      alive = false;
    }

    if (alive && this.state === DeviceConnectionState.Disconnected) {
      this.logger.info({ device: this.name }, 'PLC reports connected, correcting state');
      this.state = DeviceConnectionState.Connected;
    } else if (!alive && this.state === DeviceConnectionState.Connected) {
      this.markDisconnected(new Error('Liveness check failed'), 'liveness');
    }
    return alive;
  }

  private markDisconnected(error: unknown, operation: 'read' | 'write' | 'liveness'): void {
    this.state = DeviceConnectionState.Disconnected;
    this.recordError(error);
    this.metrics.recordDeviceConnection(this.name, false);
    this.logger.error(
      { err: error, device: this.name, operation },
      'PLC operation failed, marked disconnected',
    );
  }

  private recordError(error: unknown): void {
    this.errorCount++;
    this.lastError = errorMessage(error);
    this.metrics.recordDeviceError(
      this.name,
      error instanceof Error ? error : new Error(this.lastError),
    );
  }
}
