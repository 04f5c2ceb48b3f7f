import { PoolExhaustedError, RequestCancelledError, type RagComponent } from '../errors';
import { componentLogger } from './logger';

const log = componentLogger('pool');

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
  timeout: NodeJS.Timeout;
  detach: () => void;
}

export interface PoolConfig {
  maxSize: number;
  acquireTimeoutMs: number;
}

export interface PoolStats {
  name: string;
  active: number;
  waiting: number;
  maxSize: number;
}

/**
 * Bounded pool of provider connection slots.
 *
 * Callers beyond `maxSize` wait for a free slot up to `acquireTimeoutMs`,
 * then fail with PoolExhausted instead of queuing indefinitely.
 */
export class ResourcePool {
  private active = 0;
  private queue: Waiter[] = [];

  constructor(
    readonly name: string,
    private readonly component: RagComponent,
    private readonly config: PoolConfig
  ) {
    if (config.maxSize <= 0) {
      throw new Error(`Pool [${name}] maxSize must be > 0`);
    }
  }

  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  stats(): PoolStats {
    return {
      name: this.name,
      active: this.active,
      waiting: this.queue.length,
      maxSize: this.config.maxSize,
    };
  }

  private async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RequestCancelledError(this.component, { cause: signal.reason });
    }

    if (this.active < this.config.maxSize) {
      this.active++;
      return;
    }

    const startedAt = Date.now();
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.remove(entry);
        reject(new RequestCancelledError(this.component, { cause: signal?.reason }));
      };

      const entry: Waiter = {
        resolve,
        reject,
        timeout: setTimeout(() => {
          this.remove(entry);
          log.warn(
            { pool: this.name, waiting: this.queue.length, maxSize: this.config.maxSize },
            'Pool checkout timed out'
          );
          reject(new PoolExhaustedError(this.name, this.component, Date.now() - startedAt));
        }, this.config.acquireTimeoutMs),
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(entry);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; `active` is unchanged.
      clearTimeout(next.timeout);
      next.detach();
      next.resolve();
      return;
    }
    this.active--;
  }

  private remove(entry: Waiter): void {
    clearTimeout(entry.timeout);
    entry.detach();
    const idx = this.queue.indexOf(entry);
    if (idx >= 0) this.queue.splice(idx, 1);
  }
}
