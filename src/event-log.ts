import { mkdir, appendFile } from 'fs/promises';
import { dirname } from 'path';
import { LogWriteError } from './errors';

export interface IntervalLog {
  append(line: string): Promise<void>;
}

/**
 * Append-only interval log. Each line goes out in a single append call and
 * writes are chained, so lines land in call order and never interleave.
 */
export class EventLog implements IntervalLog {
  private initialized: Promise<void> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  private ensureDirectory(): Promise<void> {
    if (!this.initialized) {
      this.initialized = mkdir(dirname(this.filePath), { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.initialized = null;
          throw error;
        }
      );
    }
    return this.initialized;
  }

  append(line: string): Promise<void> {
    const write = this.queue.then(async () => {
      try {
        await this.ensureDirectory();
        await appendFile(this.filePath, `${line}\n`, 'utf-8');
      } catch (error) {
        throw new LogWriteError(this.filePath, error);
      }
    });
    // A failed write must not block the ones queued after it.
    this.queue = write.catch(() => undefined);
    return write;
  }
}
