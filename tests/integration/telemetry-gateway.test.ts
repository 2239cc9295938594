import { TelemetryGateway } from '../../src/services/TelemetryGateway';
import { GatewayConfig } from '../../src/config';
import { ServerState } from '../../src/types/telemetry.types';
import { connectLineClient, FakeDevice, FakePlcClient, LineClient, startFakeDevice, waitFor } from '../helpers';

const baseConfig: GatewayConfig = {
  host: '127.0.0.1',
  port: 0,
  sendDelayMs: 10,
  logLevel: 'info',
  shutdownTimeoutMs: 2000,
};

describe('TelemetryGateway', () => {
  let gateway: TelemetryGateway | undefined;
  let client: LineClient | undefined;
  let device: FakeDevice | undefined;

  afterEach(async () => {
    await gateway?.stop();
    client?.socket.destroy();
    await device?.close();
    gateway = undefined;
    client = undefined;
    device = undefined;
    jest.clearAllMocks();
  });

  it('should stream at least 50 random lines per second in test mode', async () => {
    gateway = new TelemetryGateway(baseConfig, { testMode: true });
    const { port } = await gateway.start();
    client = await connectLineClient(port);

    await new Promise((resolve) => setTimeout(resolve, 1000));
    const lines = [...client.lines];

    expect(gateway.getWorkers()).toHaveLength(0);
    expect(lines.length).toBeGreaterThanOrEqual(50);
    for (const line of lines) {
      const message = JSON.parse(line);
      expect(message.extrusion_force).toBeGreaterThanOrEqual(15.68);
      expect(message.extrusion_force).toBeLessThanOrEqual(23.52);
      expect(message.meter_count).toBeGreaterThanOrEqual(1.8);
      expect(message.meter_count).toBeLessThanOrEqual(2.2);
    }
  });

  it('should send nulls when no device is configured', async () => {
    gateway = new TelemetryGateway(baseConfig);
    const { port } = await gateway.start();
    client = await connectLineClient(port);

    const lines = client.lines;
    await waitFor(() => lines.length > 0);

    expect(lines[0]).toBe('{"extrusion_force":null,"meter_count":null}');
  });

  it('should take weight from the load cell and meter count from the PLC', async () => {
    device = await startFakeDevice(() => 'S S 1.0000 kg\r\n');
    const plc = new FakePlcClient();
    plc.setReal(1, 0, 99);
    plc.setReal(2, 0, 42);

    gateway = new TelemetryGateway(
      {
        ...baseConfig,
        loadCell: { host: '127.0.0.1', port: device.port, frequency: 100 },
        plc: {
          address: { ip: '192.168.0.60', rack: 0, slot: 1 },
          weight: { db: 1, start: 0 },
          meterCount: { db: 2, start: 0 },
          reconnectIntervalMs: 50,
          pollIntervalMs: 5,
        },
      },
      { createPlcClient: () => plc },
    );
    const { port } = await gateway.start();
    client = await connectLineClient(port);

    const lines = client.lines;
    await waitFor(() => lines.includes('{"extrusion_force":9.8,"meter_count":42}'));

    expect(gateway.getWorkers().map((w) => w.name)).toEqual(['load-cell', 'plc']);
  });

  it('should stop the server and every device worker', async () => {
    device = await startFakeDevice(() => 'S S 2 kg\r\n');
    gateway = new TelemetryGateway({
      ...baseConfig,
      loadCell: { host: '127.0.0.1', port: device.port, frequency: 100 },
    });
    const { port } = await gateway.start();
    client = await connectLineClient(port);
    const connected = client;
    await waitFor(() => connected.lines.length > 0);

    await gateway.stop('test');

    expect(gateway.getServer().getState()).toBe(ServerState.Stopped);
    expect(gateway.getWorkers().map((w) => w.getStatus().state)).toEqual(['stopped']);
    await waitFor(() => connected.ended());
  });

  it('should not touch devices when the port cannot be bound', async () => {
    const first = new TelemetryGateway(baseConfig, { testMode: true });
    const { port } = await first.start();
    const plc = new FakePlcClient();
    gateway = new TelemetryGateway(
      {
        ...baseConfig,
        port,
        plc: {
          address: { ip: '192.168.0.60', rack: 0, slot: 1 },
          meterCount: { db: 2, start: 0 },
          reconnectIntervalMs: 50,
          pollIntervalMs: 5,
        },
      },
      { createPlcClient: () => plc },
    );

    try {
      await expect(gateway.start()).rejects.toThrow(/Failed to listen/);
      expect(plc.connectCalls).toBe(0);
    } finally {
      await first.stop();
    }
  });
});
