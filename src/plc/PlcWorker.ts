import { PollingWorker } from '../devices/PollingWorker';
import { ResilientConnector } from './ResilientConnector';
import { sleep } from '../utils/async';
import { SnapshotCell } from '../telemetry/SnapshotCell';
import { emptySample } from '../telemetry/sources';
import {
  DataBlockLocation,
  DeviceConnectionState,
  PlcWorkerConfig,
  Sample,
  SnapshotReader,
  WorkerState,
} from '../types/telemetry.types';

/** Both values are stored as S7 REAL: 4 bytes, big-endian IEEE 754. */
const REAL_SIZE = 4;

/**
 * Polls the weight and meter-count data blocks through a ResilientConnector. While the
 * PLC is away reads come back empty and the cells keep their last values; the
 * connector's own loop brings the session back.
 */
export class PlcWorker extends PollingWorker {
  private readonly weightCell = new SnapshotCell<Sample>(emptySample());
  private readonly meterCell = new SnapshotCell<Sample>(emptySample());

  constructor(
    private readonly config: PlcWorkerConfig,
    private readonly connector: ResilientConnector,
  ) {
    super(config.name, 'PlcWorker');
  }

  public get weight(): SnapshotReader<Sample> {
    return this.weightCell;
  }

  public get meterCount(): SnapshotReader<Sample> {
    return this.meterCell;
  }

  protected currentSample(): Readonly<Sample> {
    return this.config.weight ? this.weightCell.get() : this.meterCell.get();
  }

  protected connectionState(): DeviceConnectionState {
    return this.connector.getState();
  }

  protected async run(signal: AbortSignal): Promise<void> {
    this.setState(WorkerState.Connecting);
    if (!(await this.connector.connect())) {
      this.logger.warn(
        { device: this.name },
        'PLC not reachable yet, background reconnection will keep trying',
      );
    }
    this.connector.start();
    this.setState(WorkerState.Polling);

    while (!signal.aborted) {
      if (this.config.weight) {
        await this.poll(this.config.weight, this.weightCell);
      }
      if (this.config.meterCount) {
        await this.poll(this.config.meterCount, this.meterCell);
      }
      await sleep(this.config.pollIntervalMs, signal);
    }
  }

  protected async close(): Promise<void> {
    await this.connector.stop();
  }

  protected release(): void {
    this.connector.stop().catch((error: unknown) => {
      this.logger.error({ err: error, device: this.name }, 'Failed to stop PLC connector');
    });
  }

  private async poll(location: DataBlockLocation, cell: SnapshotCell<Sample>): Promise<void> {
    const data = await this.connector.readBlock(location.db, location.start, REAL_SIZE);
    if (data === null) {
      return;
    }
    if (data.length < REAL_SIZE) {
      this.recordError(new Error(`Short read from DB${location.db}: ${data.length} bytes`));
      this.logger.warn(
        { device: this.name, db: location.db, start: location.start, bytes: data.length },
        'Ignoring short data block read',
      );
      return;
    }
    cell.set({ value: data.readFloatBE(0), sampledAt: new Date() });
  }
}
