import * as net from 'net';
import { ArgumentParser } from 'argparse';
import { ChunkReader } from '../utils/ChunkReader';
import { LineReader } from '../utils/LineReader';
import { writeAsync } from '../utils/async';
import { createLogger } from '../utils/logger';
import { formatResponse, SI_COMMAND, SYNTAX_ERROR_RESPONSE } from '../protocol/SicsCodec';
import { Reading } from '../types/telemetry.types';

const DEFAULT_PORT = 1026;

export interface LoadCellSimulatorOptions {
  host?: string;
  port?: number;
  /** Called for every `SI` request. */
  reading?: () => Reading;
}

/**
 * Stand-in load cell for bench runs without hardware: answers `SI` with the current
 * reading and anything else with `ES`.
 */
export class LoadCellSimulator {
  private readonly logger = createLogger('LoadCellSimulator');
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly reading: () => Reading;
  private requests = 0;

  constructor(private readonly options: LoadCellSimulatorOptions = {}) {
    this.reading = options.reading ?? (() => ({ status: 'S', gross: 0.0072, unit: 'kg' }));
    this.server = net.createServer((socket) => {
      this.serve(socket).catch((error: unknown) => {
        this.logger.error({ err: error }, 'Simulator session failed');
      });
    });
  }

  public getRequestCount(): number {
    return this.requests;
  }

  public listen(): Promise<net.AddressInfo> {
    const host = this.options.host ?? '0.0.0.0';
    const port = this.options.port ?? DEFAULT_PORT;
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.removeListener('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Simulator has no TCP address on ${host}:${port}`));
          return;
        }
        this.logger.info({ host: address.address, port: address.port }, 'Load cell simulator listening');
        resolve(address);
      });
    });
  }

  public close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    if (!this.server.listening) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.server.close(() => resolve()));
  }

  private async serve(socket: net.Socket): Promise<void> {
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.sockets.add(socket);
    this.logger.info({ peer }, 'Accepted connection');
    const lines = new LineReader(new ChunkReader(socket));

    try {
      for (;;) {
        const line = await lines.readLine();
        if (line === null) {
          break;
        }
        const command = line.trim();
        this.logger.debug({ peer, command }, 'Received command');
        if (command === SI_COMMAND) {
          this.requests++;
          await writeAsync(socket, formatResponse(this.reading()));
        } else {
          await writeAsync(socket, SYNTAX_ERROR_RESPONSE);
        }
      }
    } catch (error) {
      this.logger.warn({ err: error, peer }, 'Connection reset');
    } finally {
      this.sockets.delete(socket);
      socket.destroy();
      this.logger.info({ peer }, 'Connection closed');
    }
  }
}

async function main(): Promise<void> {
  const parser = new ArgumentParser({
    prog: 'load-cell-simulator',
    description: 'Answers SI requests like a load cell, for running the gateway without hardware',
  });
  parser.add_argument('--host', { default: '0.0.0.0', help: 'Address to listen on' });
  parser.add_argument('-p', '--port', { default: DEFAULT_PORT, type: 'int', help: 'TCP port' });
  parser.add_argument('--gross', { default: 0.0072, type: 'float', help: 'Gross weight to report' });
  parser.add_argument('--unit', { default: 'kg', help: 'Weight unit' });

  const args: { host: string; port: number; gross: number; unit: string } = parser.parse_args();
  const simulator = new LoadCellSimulator({
    host: args.host,
    port: args.port,
    reading: () => ({ status: 'S', gross: args.gross, unit: args.unit }),
  });
  await simulator.listen();

  const shutdown = (): void => {
    simulator.close().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((error) => {
    createLogger('LoadCellSimulator').fatal({ err: error }, 'Simulator failed to start');
    process.exit(1);
  });
}
