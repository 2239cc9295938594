import { SnapshotReader } from '../types/telemetry.types';

/**
 * Single-writer, many-reader value holder. `set` swaps in a frozen copy, so a reader
 * holding the previous value never sees it change underneath.
 */
export class SnapshotCell<T extends object> implements SnapshotReader<T> {
  private current: Readonly<T>;

  constructor(initial: T) {
    this.current = Object.freeze({ ...initial });
  }

  public get(): Readonly<T> {
    return this.current;
  }

  public set(next: T): void {
    this.current = Object.freeze({ ...next });
  }
}
