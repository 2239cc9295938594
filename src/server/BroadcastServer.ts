import * as net from 'net';
import { ClientSession, SessionSocket } from './ClientSession';
import { createLogger } from '../utils/logger';
import { NewRelicMetrics } from '../utils/newrelic';
import { waitWithTimeout } from '../utils/async';
import { BindError, ShutdownTimeout } from '../errors';
import { DeviceWorker, ServerState, SnapshotSource } from '../types/telemetry.types';

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 2000;

export interface BroadcastServerOptions {
  host: string;
  port: number;
  source: SnapshotSource;
  sendDelayMs: number;
  /** Bound on waiting for sessions to finish during shutdown. */
  shutdownTimeoutMs?: number;
  /** Bound on waiting for each device worker to stop. */
  workerStopTimeoutMs?: number;
  sessionCloseTimeoutMs?: number;
}

/**
 * Accepts clients and streams telemetry to each of them. Shutdown always runs in the
 * same order: stop accepting, cancel sessions, stop device workers.
 */
export class BroadcastServer {
  private readonly logger = createLogger('BroadcastServer');
  private readonly metrics = NewRelicMetrics.getInstance();
  private readonly server: net.Server;
  private readonly sessions = new Map<string, ClientSession>();
  private readonly sessionTasks = new Map<string, Promise<void>>();
  private readonly workers: DeviceWorker[] = [];
  private readonly shutdownTimeoutMs: number;
  private readonly workerStopTimeoutMs: number;
  private state = ServerState.Idle;
  private nextSessionId = 1;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: BroadcastServerOptions) {
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.workerStopTimeoutMs = options.workerStopTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.server = net.createServer((socket) => this.adopt(socket));
  }

  public getState(): ServerState {
    return this.state;
  }

  public getSessionCount(): number {
    return this.sessions.size;
  }

  /** Workers registered here are stopped after all sessions during shutdown. */
  public registerWorker(worker: DeviceWorker): void {
    this.workers.push(worker);
  }

  public listen(): Promise<net.AddressInfo> {
    const { host, port } = this.options;
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server.removeListener('listening', onListening);
        reject(new BindError(`Failed to listen on ${host}:${port}: ${err.message}`, { cause: err }));
      };
      const onListening = (): void => {
        this.server.removeListener('error', onError);
        this.server.on('error', (err) => {
          this.logger.error({ err }, 'Server error');
        });
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new BindError(`Unexpected listening address for ${host}:${port}`));
          return;
        }
        this.state = ServerState.Listening;
        this.logger.info({ host: address.address, port: address.port }, 'Server listening');
        resolve(address);
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(port, host);
    });
  }

  /** Attaches an already-connected stream as a client session. */
  public adopt(socket: SessionSocket): void {
    if (this.state !== ServerState.Listening) {
      this.logger.debug('Rejecting connection while not listening');
      socket.destroy();
      return;
    }

    const id = `session-${this.nextSessionId++}`;
    const session = new ClientSession(socket, {
      id,
      source: this.options.source,
      sendDelayMs: this.options.sendDelayMs,
      closeTimeoutMs: this.options.sessionCloseTimeoutMs,
    });
    this.sessions.set(id, session);
    this.metrics.recordSessionOpened(this.sessions.size);

    const task = session.start().finally(() => {
      this.sessions.delete(id);
      this.sessionTasks.delete(id);
      this.metrics.recordSessionClosed(this.sessions.size, Date.now() - session.openedAt.getTime());
      this.logger.info(
        { sessionId: id, peer: session.peerAddress, activeSessions: this.sessions.size },
        'Session closed',
      );
    });
    this.sessionTasks.set(id, task);
  }

  public stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.drain();
    }
    return this.stopping;
  }

  private async drain(): Promise<void> {
    this.state = ServerState.Draining;
    this.logger.info('Stopping server, no longer accepting connections');
    const listenerClosed = this.closeListener();

    await this.stopSessions();
    await this.stopWorkers();
    await listenerClosed;

    this.state = ServerState.Stopped;
    this.logger.info('Server stopped');
  }

  private closeListener(): Promise<void> {
    if (!this.server.listening) {
      return Promise.resolve();
    }
    // The callback fires once every accepted connection has closed as well
    return new Promise((resolve) => {
      this.server.close((err) => {
        if (err) {
          this.logger.warn({ err }, 'Error while closing listener');
        }
        resolve();
      });
    });
  }

  private async stopSessions(): Promise<void> {
    if (this.sessions.size === 0) {
      return;
    }

    this.logger.info({ count: this.sessions.size }, 'Cancelling active client sessions');
    for (const session of this.sessions.values()) {
      session.cancel('server shutdown');
    }

    const finished = await waitWithTimeout(
      Promise.all(this.sessionTasks.values()),
      this.shutdownTimeoutMs,
    );
    if (finished) {
      return;
    }

    const err = new ShutdownTimeout(
      `${this.sessions.size} session(s) still open after ${this.shutdownTimeoutMs}ms`,
    );
    this.logger.warn({ err }, 'Force-closing client sessions');
    this.metrics.recordShutdownTimeout('sessions');
    for (const session of this.sessions.values()) {
      session.terminate();
    }
    await Promise.all(this.sessionTasks.values());
  }

  private async stopWorkers(): Promise<void> {
    if (this.workers.length === 0) {
      return;
    }

    this.logger.info({ count: this.workers.length }, 'Stopping device workers');
    await Promise.all(
      this.workers.map(async (worker) => {
        if (await waitWithTimeout(worker.stop(), this.workerStopTimeoutMs)) {
          return;
        }
        const err = new ShutdownTimeout(
          `Worker ${worker.name} did not stop within ${this.workerStopTimeoutMs}ms`,
        );
        this.logger.warn({ err, device: worker.name }, 'Force-cancelling device worker');
        this.metrics.recordShutdownTimeout('devices');
        worker.terminate();
      }),
    );
  }
}
