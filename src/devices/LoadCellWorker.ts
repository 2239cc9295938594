import * as net from 'net';
import { PollingWorker } from './PollingWorker';
import { ChunkReader } from '../utils/ChunkReader';
import { LineReader } from '../utils/LineReader';
import { abortError, sleep, writeAsync } from '../utils/async';
import { ConnectError } from '../errors';
import { SnapshotCell } from '../telemetry/SnapshotCell';
import { emptySample } from '../telemetry/sources';
import { SI_COMMAND, encodeCommand, parseResponse } from '../protocol/SicsCodec';
import { LoadCellConfig, Sample, SnapshotReader, WorkerState } from '../types/telemetry.types';

const DEFAULT_CONNECT_TIMEOUT_MS = 2000;
const DEFAULT_READ_TIMEOUT_MS = 2000;

/**
 * Polls a load cell over TCP with the `SI` command and keeps the last gross weight
 * that decoded cleanly. A connect failure stops the worker; the cached weight stays
 * as it was (NaN if the device never answered).
 */
export class LoadCellWorker extends PollingWorker {
  private readonly cell = new SnapshotCell<Sample>(emptySample());
  private readonly host: string;
  private readonly port: number;
  private readonly pollIntervalMs: number;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private socket: net.Socket | null = null;

  constructor(config: LoadCellConfig) {
    super(config.name, 'LoadCellWorker');
    this.host = config.host;
    this.port = config.port;
    this.pollIntervalMs = 1000 / config.frequency;
    this.connectTimeoutMs = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.readTimeoutMs = config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  }

  /** Gross weight in the device's unit (kg). */
  public get weight(): SnapshotReader<Sample> {
    return this.cell;
  }

  protected currentSample(): Readonly<Sample> {
    return this.cell.get();
  }

  protected async run(signal: AbortSignal): Promise<void> {
    this.setState(WorkerState.Connecting);
    this.logger.info(
      { device: this.name, host: this.host, port: this.port },
      'Opening connection to load cell',
    );

    const socket = await this.open(signal);
    this.socket = socket;
    const lines = new LineReader(new ChunkReader(socket));
    this.setState(WorkerState.Polling);
    this.metrics.recordDeviceConnection(this.name, true);

    const command = encodeCommand(SI_COMMAND);
    while (!signal.aborted) {
      lines.discard();
      this.logger.trace({ device: this.name, command: SI_COMMAND }, 'Sending command');
      await writeAsync(socket, command, signal);

      const response = await lines.readLine({ signal, timeoutMs: this.readTimeoutMs });
      if (response === null) {
        throw new ConnectError(`Load cell at ${this.host}:${this.port} closed the connection`);
      }
      this.handleResponse(response);

      await sleep(this.pollIntervalMs, signal);
    }
  }

  protected async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) {
      return;
    }
    this.logger.info({ device: this.name }, 'Closing load cell connection');
    this.metrics.recordDeviceConnection(this.name, false);
    socket.destroy();
  }

  protected release(): void {
    this.socket?.destroy();
  }

  private handleResponse(response: string): void {
    this.logger.trace({ device: this.name, response }, 'Received response');

    const result = parseResponse(response);
    if (!result.ok) {
      // Keep the previous weight rather than publish a partial reading
      this.recordError(result.error);
      this.logger.error(
        { err: result.error, device: this.name },
        'Discarding unparseable load cell response',
      );
      return;
    }

    this.cell.set({ value: result.reading.gross, sampledAt: new Date() });
  }

  private open(signal: AbortSignal): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }

      const socket = net.createConnection({ host: this.host, port: this.port });
      const cleanup = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
      };
      const fail = (error: Error): void => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onConnect = (): void => {
        cleanup();
        resolve(socket);
      };
      const onError = (err: Error): void =>
        fail(
          new ConnectError(
            `Failed to connect to load cell at ${this.host}:${this.port}: ${err.message}`,
            { cause: err },
          ),
        );
      const onAbort = (): void => fail(abortError());
      const timer = setTimeout(
        () => fail(new ConnectError(`Timed out connecting to load cell at ${this.host}:${this.port}`)),
        this.connectTimeoutMs,
      );

      socket.once('connect', onConnect);
      socket.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
