import { LoadCellSimulator } from '../../../src/simulator/LoadCellSimulator';
import { LoadCellWorker } from '../../../src/devices/LoadCellWorker';
import { connectLineClient, LineClient, waitFor } from '../../helpers';

describe('LoadCellSimulator', () => {
  let simulator: LoadCellSimulator;
  let port: number;
  let client: LineClient | undefined;

  beforeEach(async () => {
    let gross = 0;
    simulator = new LoadCellSimulator({
      host: '127.0.0.1',
      port: 0,
      reading: () => ({ status: 'S', gross: (gross += 1.5), unit: 'kg' }),
    });
    port = (await simulator.listen()).port;
  });

  afterEach(async () => {
    client?.socket.destroy();
    client = undefined;
    await simulator.close();
  });

  it('should answer SI with the current reading', async () => {
    client = await connectLineClient(port);
    client.socket.write('SI\r\n');

    await waitFor(() => client?.lines.length === 1);
    expect(client.lines).toEqual(['S S 1.5 kg\r']);
    expect(simulator.getRequestCount()).toBe(1);
  });

  it('should answer an unknown command with a syntax error', async () => {
    client = await connectLineClient(port);
    client.socket.write('S\r\n');

    await waitFor(() => client?.lines.length === 1);
    expect(client.lines).toEqual(['ES\r']);
    expect(simulator.getRequestCount()).toBe(0);
  });

  it('should answer a command written in two parts', async () => {
    client = await connectLineClient(port);
    client.socket.write('S');
    await new Promise((resolve) => setTimeout(resolve, 20));
    client.socket.write('I\r\n');

    await waitFor(() => client?.lines.length === 1);
    expect(client.lines).toEqual(['S S 1.5 kg\r']);
  });

  it('should feed a load cell worker', async () => {
    const worker = new LoadCellWorker({ name: 'load-cell', host: '127.0.0.1', port, frequency: 100 });
    try {
      worker.start();
      await waitFor(() => worker.weight.get().value >= 3);

      expect(worker.getStatus().errorCount).toBe(0);
      expect(simulator.getRequestCount()).toBeGreaterThanOrEqual(2);
    } finally {
      await worker.stop();
    }
  });
});
