import { Duplex } from 'stream';
import { createLogger } from '../utils/logger';
import { ChunkReader } from '../utils/ChunkReader';
import { isAbortError, sleep, waitWithTimeout, writeAsync } from '../utils/async';
import { PeerDisconnect } from '../errors';
import { encodeTelemetryLine } from '../telemetry/sources';
import { SnapshotSource } from '../types/telemetry.types';

const logger = createLogger('ClientSession');

const DEFAULT_CLOSE_TIMEOUT_MS = 1000;
/** Inbound text is logged in slices of at most this many bytes. */
const RECEIVE_BUFFER_SIZE = 1024;

/** A TCP socket, or any duplex stream standing in for one. */
export type SessionSocket = Duplex & {
  remoteAddress?: string;
  remotePort?: number;
};

export interface ClientSessionOptions {
  id: string;
  source: SnapshotSource;
  sendDelayMs: number;
  closeTimeoutMs?: number;
}

/**
 * One connected client: a send loop pushing a telemetry line every `sendDelayMs` and a
 * receive loop draining whatever the client sends. Whichever loop ends first cancels
 * the other; the socket is closed once both have returned.
 */
export class ClientSession {
  public readonly id: string;
  public readonly peerAddress: string;
  public readonly openedAt = new Date();
  private readonly source: SnapshotSource;
  private readonly sendDelayMs: number;
  private readonly closeTimeoutMs: number;
  private readonly controller = new AbortController();
  private task: Promise<void> | null = null;

  constructor(
    private readonly socket: SessionSocket,
    options: ClientSessionOptions,
  ) {
    this.id = options.id;
    this.source = options.source;
    this.sendDelayMs = options.sendDelayMs;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.peerAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
  }

  /** Runs the session; resolves after both loops exited and the socket closed. */
  public start(): Promise<void> {
    if (!this.task) {
      this.task = this.run();
    }
    return this.task;
  }

  public cancel(reason = 'cancelled'): void {
    if (this.controller.signal.aborted) {
      return;
    }
    logger.debug({ sessionId: this.id, peer: this.peerAddress, reason }, 'Cancelling session');
    this.controller.abort();
  }

  /** Cancels and destroys the socket without waiting for a clean close. */
  public terminate(): void {
    this.cancel('terminated');
    this.socket.destroy();
  }

  private async run(): Promise<void> {
    logger.info({ sessionId: this.id, peer: this.peerAddress }, 'Accepted new client');
    const signal = this.controller.signal;
    const reader = new ChunkReader(this.socket);

    try {
      await Promise.all([this.sendLoop(signal), this.receiveLoop(reader, signal)]);
    } finally {
      await this.close();
    }
  }

  private async sendLoop(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const line = encodeTelemetryLine(this.source.read());
        logger.trace({ sessionId: this.id, line }, 'Sending telemetry');
        await writeAsync(this.socket, line, signal);
        await sleep(this.sendDelayMs, signal);
      }
    } catch (error) {
      if (isAbortError(error)) {
        logger.debug({ sessionId: this.id }, 'Send loop cancelled');
      } else {
        const err = new PeerDisconnect(`Write to ${this.peerAddress} failed`, { cause: error });
        logger.warn({ err, sessionId: this.id, peer: this.peerAddress }, 'Client disconnected');
      }
    } finally {
      this.cancel('send loop ended');
    }
  }

  private async receiveLoop(reader: ChunkReader, signal: AbortSignal): Promise<void> {
    try {
      for (;;) {
        const chunk = await reader.read({ signal });
        if (chunk === null) {
          logger.info({ sessionId: this.id, peer: this.peerAddress }, 'Client has disconnected');
          return;
        }
        for (let offset = 0; offset < chunk.length; offset += RECEIVE_BUFFER_SIZE) {
          const message = chunk.subarray(offset, offset + RECEIVE_BUFFER_SIZE).toString('utf-8');
          logger.info(
            { sessionId: this.id, peer: this.peerAddress, message: message.trim() },
            'Received from client',
          );
        }
      }
    } catch (error) {
      if (isAbortError(error)) {
        logger.debug({ sessionId: this.id }, 'Receive loop cancelled');
      } else {
        const err = new PeerDisconnect(`Connection to ${this.peerAddress} reset`, { cause: error });
        logger.warn({ err, sessionId: this.id, peer: this.peerAddress }, 'Client connection reset');
      }
    } finally {
      this.cancel('receive loop ended');
    }
  }

  private async close(): Promise<void> {
    logger.info({ sessionId: this.id, peer: this.peerAddress }, 'Closing client socket');
    if (this.socket.closed) {
      return;
    }

    const closed = new Promise<void>((resolve) => this.socket.once('close', () => resolve()));
    if (!this.socket.destroyed) {
      this.socket.end();
    }
    if (!(await waitWithTimeout(closed, this.closeTimeoutMs))) {
      logger.warn(
        { sessionId: this.id, peer: this.peerAddress, timeoutMs: this.closeTimeoutMs },
        'Client socket did not close cleanly, destroying',
      );
      this.socket.destroy();
      await closed;
    }
  }
}
