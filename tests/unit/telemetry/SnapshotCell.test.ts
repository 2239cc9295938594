import { SnapshotCell } from '../../../src/telemetry/SnapshotCell';
import { Sample } from '../../../src/types/telemetry.types';

describe('SnapshotCell', () => {
  it('should return the initial value', () => {
    const cell = new SnapshotCell<Sample>({ value: 1, sampledAt: null });

    expect(cell.get()).toEqual({ value: 1, sampledAt: null });
  });

  it('should hand out frozen values', () => {
    const cell = new SnapshotCell<Sample>({ value: 1, sampledAt: null });

    expect(Object.isFrozen(cell.get())).toBe(true);
  });

  it('should leave earlier snapshots untouched when a new value is set', () => {
    const cell = new SnapshotCell<Sample>({ value: 1, sampledAt: null });
    const before = cell.get();

    cell.set({ value: 2, sampledAt: new Date(0) });

    expect(before.value).toBe(1);
    expect(cell.get().value).toBe(2);
  });

  it('should copy the value on set', () => {
    const cell = new SnapshotCell<Sample>({ value: 1, sampledAt: null });
    const next: Sample = { value: 5, sampledAt: null };

    cell.set(next);
    next.value = 6;

    expect(cell.get().value).toBe(5);
  });
});
