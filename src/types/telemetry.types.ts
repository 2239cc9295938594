export enum DeviceConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Stopping = 'stopping',
}

export enum WorkerState {
  Idle = 'idle',
  Connecting = 'connecting',
  Polling = 'polling',
  Closing = 'closing',
  Stopped = 'stopped',
}

export enum ServerState {
  Idle = 'idle',
  Listening = 'listening',
  Draining = 'draining',
  Stopped = 'stopped',
}

export interface Reading {
  status: string;
  gross: number;
  unit: string;
}

/** Latest value produced by a single device worker. */
export interface Sample {
  value: number;
  sampledAt: Date | null;
}

export interface SensorSnapshot {
  /** Kilograms, NaN until the load cell has been sampled once. */
  weight: number;
  meterCount: number;
  sampledAt: Date | null;
}

/** One line of the gateway → client wire format. */
export interface TelemetryMessage {
  extrusion_force: number | null;
  meter_count: number | null;
}

export interface SnapshotReader<T> {
  get(): Readonly<T>;
}

export interface SnapshotSource {
  read(): SensorSnapshot;
}

export interface DeviceStatus {
  name: string;
  state: WorkerState;
  connection: DeviceConnectionState;
  value: number;
  lastSampleAt?: Date;
  errorCount: number;
  lastError?: string;
}

export interface DeviceWorker {
  readonly name: string;
  start(): void;
  /** Requests a cooperative stop and resolves once the worker has released its device. */
  stop(): Promise<void>;
  /** Releases the device immediately without waiting for the polling loop. */
  terminate(): void;
  whenStopped(): Promise<void>;
  getStatus(): DeviceStatus;
}

/** Minimal surface of a field-bus client; every call may throw on device loss. */
export interface PlcClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  dbRead(db: number, start: number, size: number): Promise<Buffer>;
  dbWrite(db: number, start: number, data: Buffer): Promise<void>;
}

export interface PulseCounter {
  readonly steps: number;
  close(): void;
}

export interface LoadCellConfig {
  name: string;
  host: string;
  port: number;
  /** Polls per second. */
  frequency: number;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}

export interface PlcAddress {
  ip: string;
  rack: number;
  slot: number;
}

export interface DataBlockLocation {
  db: number;
  start: number;
}

export interface PlcWorkerConfig {
  name: string;
  weight?: DataBlockLocation;
  meterCount?: DataBlockLocation;
  pollIntervalMs: number;
}

export interface EncoderPins {
  pinA: number;
  pinB: number;
}
