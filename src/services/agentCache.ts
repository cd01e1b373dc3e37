import { Logger, logger as defaultLogger } from '../utils/logger.js';

export interface CacheEntry<T> {
  value: T;
  createdAt: number;
}

export interface AgentCacheOptions {
  ttlMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Holds one expensive value for `ttlMs`. Concurrent misses share a single
 * build; a failed build leaves the cache empty so the next caller retries.
 */
export class AgentCache<T> {
  private entry: CacheEntry<T> | null = null;
  private pending: Promise<T> | null = null;
  private generation: number = 0;
  private ttlMs: number;
  private now: () => number;
  private logger: Logger;
  private builds: number = 0;

  constructor(private readonly factory: () => Promise<T>, options: AgentCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  setTtl(ttlMs: number): void {
    this.ttlMs = ttlMs;
  }

  isFresh(): boolean {
    return this.entry !== null && this.now() - this.entry.createdAt < this.ttlMs;
  }

  peek(): CacheEntry<T> | null {
    return this.isFresh() ? this.entry : null;
  }

  getBuildCount(): number {
    return this.builds;
  }

  async get(): Promise<T> {
    if (this.entry && this.isFresh()) {
      this.logger.debug('Using cached agent');
      return this.entry.value;
    }

    if (this.pending) {
      return this.pending;
    }

    const generation = this.generation;
    this.builds++;
    this.logger.info(this.entry ? 'Cached agent expired, rebuilding' : 'Creating new fallback agent');

    const build = this.factory()
      .then(value => {
        if (generation === this.generation) {
          this.entry = { value, createdAt: this.now() };
        }
        return value;
      })
      .finally(() => {
        if (this.pending === build) {
          this.pending = null;
        }
      });

    this.pending = build;
    return build;
  }

  invalidate(): void {
    this.generation++;
    this.entry = null;
    this.pending = null;
  }
}
