import { Readable } from 'stream';
import { DeviceTimeoutError } from '../errors';
import { abortError } from './async';

export interface ReadOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

interface Waiter {
  resolve: (chunk: Buffer | null) => void;
  reject: (error: Error) => void;
}

/**
 * Pull-style reader over a socket's data events. Chunks that arrive while nobody
 * is reading are queued, so nothing is lost between reads.
 */
export class ChunkReader {
  private readonly chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private waiter: Waiter | null = null;

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      this.flush();
    });
    stream.on('end', () => {
      this.ended = true;
      this.flush();
    });
    stream.on('close', () => {
      this.ended = true;
      this.flush();
    });
    stream.on('error', (err: Error) => {
      this.failure = err;
      this.flush();
    });
  }

  /**
   * Resolves with the next chunk, or `null` once the stream has ended. Rejects with the
   * stream's error, a DeviceTimeoutError after `timeoutMs`, or an AbortError.
   */
  public read(options: ReadOptions = {}): Promise<Buffer | null> {
    if (this.waiter) {
      return Promise.reject(new Error('A read is already pending'));
    }

    const { signal, timeoutMs } = options;
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => settle(() => reject(abortError()));
      const settle = (finish: () => void): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        finish();
      };

      this.waiter = {
        resolve: (chunk) => settle(() => resolve(chunk)),
        reject: (error) => settle(() => reject(error)),
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () => settle(() => reject(new DeviceTimeoutError(`No data within ${timeoutMs}ms`))),
          timeoutMs,
        );
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.flush();
    });
  }

  /** Drops queued chunks, e.g. a late answer to an earlier request. */
  public discard(): void {
    this.chunks.length = 0;
  }

  private flush(): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }

    const chunk = this.chunks.shift();
    if (chunk) {
      waiter.resolve(chunk);
    } else if (this.failure) {
      waiter.reject(this.failure);
    } else if (this.ended) {
      waiter.resolve(null);
    }
  }
}
