import { ChunkReader, ReadOptions } from './ChunkReader';

/** Longest line kept before it is handed out unterminated. */
const MAX_LINE_LENGTH = 1024;

/**
 * Frames a device stream into lines. Replies may arrive split over several chunks or
 * several to a chunk; both `\r\n` and a bare `\n` end a line.
 */
export class LineReader {
  private rxBuffer = '';

  constructor(
    private readonly chunks: ChunkReader,
    private readonly encoding: BufferEncoding = 'ascii',
  ) {}

  /**
   * Resolves with the next line without its terminator, or `null` once the stream has
   * ended. `timeoutMs` bounds the whole line, not each chunk.
   */
  public async readLine(options: ReadOptions = {}): Promise<string | null> {
    const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;

    for (;;) {
      const line = this.takeLine();
      if (line !== null) {
        return line;
      }

      const timeoutMs = deadline !== undefined ? Math.max(deadline - Date.now(), 0) : undefined;
      const chunk = await this.chunks.read({ signal: options.signal, timeoutMs });
      if (chunk === null) {
        return null;
      }
      this.rxBuffer += chunk.toString(this.encoding);
    }
  }

  /** Drops buffered input, e.g. lines left over from an earlier request. */
  public discard(): void {
    this.rxBuffer = '';
    this.chunks.discard();
  }

  private takeLine(): string | null {
    const end = this.rxBuffer.indexOf('\n');
    if (end >= 0) {
      const line = this.rxBuffer.slice(0, end);
      this.rxBuffer = this.rxBuffer.slice(end + 1);
      return line.endsWith('\r') ? line.slice(0, -1) : line;
    }
    if (this.rxBuffer.length >= MAX_LINE_LENGTH) {
      const line = this.rxBuffer;
      this.rxBuffer = '';
      return line;
    }
    return null;
  }
}
