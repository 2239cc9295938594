import { MeterCountWorker } from '../../../src/devices/MeterCountWorker';
import { DeviceConnectionState, PulseCounter, WorkerState } from '../../../src/types/telemetry.types';
import { waitFor } from '../../helpers';

class FakeCounter implements PulseCounter {
  public steps = 0;
  public close = jest.fn();
}

describe('MeterCountWorker', () => {
  let counter: FakeCounter;
  let worker: MeterCountWorker;

  beforeEach(() => {
    counter = new FakeCounter();
    worker = new MeterCountWorker('encoder', () => counter, 5);
  });

  afterEach(async () => {
    await worker.stop();
    jest.clearAllMocks();
  });

  it('should sample the counter into its cell', async () => {
    worker.start();
    counter.steps = 5;

    await waitFor(() => worker.meterCount.get().value === 5);

    expect(worker.getStatus().connection).toBe(DeviceConnectionState.Connected);
  });

  it('should close the counter exactly once on stop', async () => {
    worker.start();
    await waitFor(() => worker.getStatus().state === WorkerState.Polling);

    await worker.stop();
    await worker.stop();

    expect(counter.close).toHaveBeenCalledTimes(1);
    expect(worker.getStatus().state).toBe(WorkerState.Stopped);
  });

  it('should close the counter immediately on terminate', async () => {
    worker.start();
    await waitFor(() => worker.getStatus().state === WorkerState.Polling);

    worker.terminate();
    await worker.whenStopped();

    expect(counter.close).toHaveBeenCalledTimes(1);
    expect(worker.getStatus().state).toBe(WorkerState.Stopped);
  });

  it('should stop without throwing when the counter cannot be opened', async () => {
    worker = new MeterCountWorker('encoder', () => {
      throw new Error('EACCES: /sys/class/gpio/export');
    });

    worker.start();
    await worker.whenStopped();

    const status = worker.getStatus();
    expect(status.state).toBe(WorkerState.Stopped);
    expect(status.value).toBeNaN();
    expect(status.errorCount).toBe(1);
    expect(status.lastError).toBe('Failed to open pulse counter');
  });

  it('should report stopped when stopped before starting', async () => {
    await worker.stop();

    expect(worker.getStatus().state).toBe(WorkerState.Stopped);
  });
});
