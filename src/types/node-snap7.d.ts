declare module 'node-snap7' {
  export class S7Client {
    ConnectTo(ip: string, rack: number, slot: number, callback: (err?: number) => void): void;
    Disconnect(): boolean;
    Connected(): boolean;
    DBRead(
      dbNumber: number,
      start: number,
      size: number,
      callback: (err: number | undefined, data: Buffer) => void,
    ): void;
    DBWrite(
      dbNumber: number,
      start: number,
      size: number,
      buffer: Buffer,
      callback: (err?: number) => void,
    ): void;
    ErrorText(code: number): string;
  }
}
