import * as net from 'net';
import { formatResponse } from '../src/protocol/SicsCodec';
import { Reading } from '../src/types/telemetry.types';

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000,
  intervalMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export interface FakeDevice {
  port: number;
  commands: string[];
  close(): Promise<void>;
}

/** A reading, raw text, text written in parts, or `null` for no answer. */
export type FakeReply = Reading | string | string[] | null;

/** Delay between the parts of a reply given as an array. */
const PART_DELAY_MS = 20;

/**
 * In-process TCP device: answers every CRLF-terminated command with `respond(command)`.
 * Readings are rendered with the device codec.
 */
export async function startFakeDevice(respond: (command: string) => FakeReply): Promise<FakeDevice> {
  const commands: string[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    let pending = '';
    socket.on('data', (chunk) => {
      pending += chunk.toString('ascii');
      let index = pending.indexOf('\r\n');
      while (index >= 0) {
        const command = pending.slice(0, index);
        pending = pending.slice(index + 2);
        commands.push(command);
        writeReply(socket, respond(command));
        index = pending.indexOf('\r\n');
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Fake device has no TCP address');
  }

  return {
    port: address.port,
    commands,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  };
}

function writeReply(socket: net.Socket, reply: FakeReply): void {
  if (reply === null) {
    return;
  }
  if (typeof reply === 'string') {
    socket.write(reply);
    return;
  }
  if (Array.isArray(reply)) {
    reply.forEach((part, index) => {
      setTimeout(() => {
        if (!socket.destroyed) {
          socket.write(part);
        }
      }, index * PART_DELAY_MS);
    });
    return;
  }
  socket.write(formatResponse(reply));
}

/** Port that refuses connections: bound once, then released. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('No TCP address');
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

export interface LineClient {
  socket: net.Socket;
  lines: string[];
  ended: () => boolean;
}

/** Connects to a gateway and collects the newline-terminated lines it sends. */
export function connectLineClient(port: number, host = '127.0.0.1'): Promise<LineClient> {
  return new Promise((resolve, reject) => {
    const lines: string[] = [];
    let closed = false;
    let pending = '';
    const socket = net.createConnection({ host, port }, () => {
      socket.removeListener('error', reject);
      socket.on('error', () => undefined);
      resolve({ socket, lines, ended: () => closed });
    });
    socket.once('error', reject);
    socket.on('data', (chunk) => {
      pending += chunk.toString('utf-8');
      let index = pending.indexOf('\n');
      while (index >= 0) {
        lines.push(pending.slice(0, index));
        pending = pending.slice(index + 1);
        index = pending.indexOf('\n');
      }
    });
    socket.on('close', () => {
      closed = true;
    });
  });
}

/**
 * In-memory PLC. Data blocks hold big-endian REALs; `online = false` makes every call
 * fail the way a dropped session does.
 */
export class FakePlcClient {
  public online = true;
  public connectCalls = 0;
  public disconnectCalls = 0;
  public readCalls = 0;
  public maxConcurrent = 0;
  public shortReads = false;
  private session = false;
  private active = 0;
  private readonly blocks = new Map<number, Buffer>();

  public setReal(db: number, start: number, value: number): void {
    const block = this.blocks.get(db) ?? Buffer.alloc(64);
    block.writeFloatBE(value, start);
    this.blocks.set(db, block);
  }

  public async connect(): Promise<void> {
    this.connectCalls++;
    await this.track(async () => {
      if (!this.online) {
        throw new Error('Connection refused');
      }
      this.session = true;
    });
  }

  public async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.session = false;
  }

  public isConnected(): boolean {
    return this.online && this.session;
  }

  public dbRead(db: number, start: number, size: number): Promise<Buffer> {
    this.readCalls++;
    return this.track(async () => {
      if (!this.online || !this.session) {
        this.session = false;
        throw new Error('Connection reset by peer');
      }
      const block = this.blocks.get(db) ?? Buffer.alloc(64);
      return Buffer.from(block.subarray(start, start + (this.shortReads ? size - 2 : size)));
    });
  }

  public dbWrite(db: number, start: number, data: Buffer): Promise<void> {
    return this.track(async () => {
      if (!this.online || !this.session) {
        this.session = false;
        throw new Error('Connection reset by peer');
      }
      const block = this.blocks.get(db) ?? Buffer.alloc(64);
      data.copy(block, start);
      this.blocks.set(db, block);
    });
  }

  private async track<T>(operation: () => Promise<T>): Promise<T> {
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    try {
      // Yield so overlapping callers would actually overlap
      await new Promise((resolve) => setImmediate(resolve));
      return await operation();
    } finally {
      this.active--;
    }
  }
}
