/// <reference path="../types/node-snap7.d.ts" />
import { S7Client } from 'node-snap7';
import { PlcAddress, PlcClient } from '../types/telemetry.types';

export class PlcClientError extends Error {
  constructor(
    public readonly operation: string,
    public readonly snap7Code: number,
    message: string,
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'PlcClientError';
  }
}

/**
 * Siemens S7 client over node-snap7. The async calls run on libuv's thread pool, so a
 * slow PLC never blocks the event loop.
 */
export class Snap7PlcClient implements PlcClient {
  private readonly client = new S7Client();

  constructor(private readonly address: PlcAddress) {}

  public connect(): Promise<void> {
    const { ip, rack, slot } = this.address;
    return new Promise((resolve, reject) => {
      this.client.ConnectTo(ip, rack, slot, (err) => {
        if (err) {
          reject(this.toError('ConnectTo', err));
        } else {
          resolve();
        }
      });
    });
  }

  public async disconnect(): Promise<void> {
    this.client.Disconnect();
  }

  public isConnected(): boolean {
    return this.client.Connected();
  }

  public dbRead(db: number, start: number, size: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      this.client.DBRead(db, start, size, (err, data) => {
        if (err) {
          reject(this.toError('DBRead', err));
        } else {
          resolve(data);
        }
      });
    });
  }

  public dbWrite(db: number, start: number, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.DBWrite(db, start, data.length, data, (err) => {
        if (err) {
          reject(this.toError('DBWrite', err));
        } else {
          resolve();
        }
      });
    });
  }

  private toError(operation: string, code: number): PlcClientError {
    return new PlcClientError(operation, code, this.client.ErrorText(code));
  }
}
