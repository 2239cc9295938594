import { PollingWorker } from './PollingWorker';
import { sleep } from '../utils/async';
import { ConnectError } from '../errors';
import { SnapshotCell } from '../telemetry/SnapshotCell';
import { emptySample } from '../telemetry/sources';
import { PulseCounter, Sample, SnapshotReader, WorkerState } from '../types/telemetry.types';

const DEFAULT_POLL_INTERVAL_MS = 10;

/**
 * Publishes the step count of a pulse counter (the line's rotary encoder). The counter
 * updates itself from GPIO edges; this worker only samples it on a fixed cadence.
 */
export class MeterCountWorker extends PollingWorker {
  private readonly cell = new SnapshotCell<Sample>(emptySample());
  private counter: PulseCounter | null = null;

  constructor(
    name: string,
    private readonly openCounter: () => PulseCounter,
    private readonly pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
  ) {
    super(name, 'MeterCountWorker');
  }

  public get meterCount(): SnapshotReader<Sample> {
    return this.cell;
  }

  protected currentSample(): Readonly<Sample> {
    return this.cell.get();
  }

  protected async run(signal: AbortSignal): Promise<void> {
    this.setState(WorkerState.Connecting);
    const counter = this.open();
    this.counter = counter;
    this.setState(WorkerState.Polling);
    this.metrics.recordDeviceConnection(this.name, true);
    this.logger.info({ device: this.name }, 'Pulse counter opened');

    while (!signal.aborted) {
      this.cell.set({ value: counter.steps, sampledAt: new Date() });
      await sleep(this.pollIntervalMs, signal);
    }
  }

  private open(): PulseCounter {
    try {
      return this.openCounter();
    } catch (error) {
      throw new ConnectError('Failed to open pulse counter', { cause: error });
    }
  }

  protected async close(): Promise<void> {
    this.release();
  }

  protected release(): void {
    const counter = this.counter;
    this.counter = null;
    if (!counter) {
      return;
    }
    this.metrics.recordDeviceConnection(this.name, false);
    counter.close();
  }
}
