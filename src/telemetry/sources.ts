import { Sample, SensorSnapshot, SnapshotReader, SnapshotSource, TelemetryMessage } from '../types/telemetry.types';

/** Standard gravity used to turn kilograms into newtons. */
export const GRAVITY = 9.8;

export function emptySample(value = NaN): Sample {
  return { value, sampledAt: null };
}

/**
 * Joins the weight and meter-count cells of whichever workers own them. A missing
 * reader yields NaN for that field.
 */
export class DeviceSnapshotSource implements SnapshotSource {
  constructor(
    private readonly weight: SnapshotReader<Sample> | null,
    private readonly meterCount: SnapshotReader<Sample> | null,
  ) {}

  public read(): SensorSnapshot {
    const weight = this.weight?.get() ?? emptySample();
    const meterCount = this.meterCount?.get() ?? emptySample();
    return {
      weight: weight.value,
      meterCount: meterCount.value,
      sampledAt: latest(weight.sampledAt, meterCount.sampledAt),
    };
  }
}

/** Test mode: both readings drawn uniformly from `center ± spread` on every read. */
export class RandomSnapshotSource implements SnapshotSource {
  constructor(
    private readonly center = 2,
    private readonly spread = 0.2,
    private readonly random: () => number = Math.random,
  ) {}

  public read(): SensorSnapshot {
    return {
      weight: this.draw(),
      meterCount: this.draw(),
      sampledAt: new Date(),
    };
  }

  private draw(): number {
    return this.center + (this.random() * 2 - 1) * this.spread;
  }
}

export function toTelemetryMessage(snapshot: SensorSnapshot): TelemetryMessage {
  return {
    extrusion_force: finiteOrNull(snapshot.weight * GRAVITY),
    meter_count: finiteOrNull(snapshot.meterCount),
  };
}

/** One newline-terminated JSON frame. */
export function encodeTelemetryLine(snapshot: SensorSnapshot): string {
  return `${JSON.stringify(toTelemetryMessage(snapshot))}\n`;
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

function latest(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() >= b.getTime() ? a : b;
}
