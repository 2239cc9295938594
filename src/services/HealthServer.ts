import * as http from 'http';
import { createLogger } from '../utils/logger';
import { DeviceConnectionState, DeviceStatus, ServerState } from '../types/telemetry.types';

export interface HealthSnapshot {
  serverState: ServerState;
  sessions: number;
  testMode: boolean;
  devices: DeviceStatus[];
}

/** HTTP side channel for orchestrators: `/health` and `/metrics`, JSON only. */
export class HealthServer {
  private readonly logger = createLogger('HealthServer');
  private readonly server: http.Server;

  constructor(
    private readonly port: number,
    private readonly snapshot: () => HealthSnapshot,
  ) {
    this.server = http.createServer((req, res) => this.handle(req, res));
  }

  public listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, () => {
        this.server.removeListener('error', reject);
        const address = this.server.address();
        const port = address !== null && typeof address !== 'string' ? address.port : this.port;
        this.logger.info({ port }, 'Health server started');
        resolve(port);
      });
    });
  }

  public close(): Promise<void> {
    if (!this.server.listening) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.server.close((err) => {
        if (err) {
          this.logger.warn({ err }, 'Error while closing health server');
        }
        resolve();
      });
      this.server.closeAllConnections();
    });
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (req.url === '/health' && req.method === 'GET') {
      const snapshot = this.snapshot();
      const healthy = snapshot.serverState === ServerState.Listening;

      res.writeHead(healthy ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: healthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
          server: snapshot.serverState,
          sessions: snapshot.sessions,
          testMode: snapshot.testMode,
          devices: snapshot.devices,
        }),
      );
    } else if (req.url === '/metrics' && req.method === 'GET') {
      const { devices, sessions } = this.snapshot();
      const connected = devices.filter(
        (d) => d.connection === DeviceConnectionState.Connected,
      ).length;

      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          sessions_active: sessions,
          devices_total: devices.length,
          devices_connected: connected,
          devices_disconnected: devices.length - connected,
          total_errors: devices.reduce((sum, d) => sum + d.errorCount, 0),
        }),
      );
    } else {
      res.writeHead(404);
      res.end('Not Found');
    }
  }
}
