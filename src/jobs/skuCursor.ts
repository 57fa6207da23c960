import type { ForecastStore } from '../domains/forecasting';
import type { CacheStore } from '../lib/redis';

const CURSOR_TTL_SECONDS = 30 * 86_400;

/**
 * Remembers how far a batch job got through the active SKU list so each run
 * takes the next page. The cursor wraps to the start once a short page shows
 * the end of the list was reached.
 */
export class SkuCursorStore {
  constructor(
    private readonly cache: CacheStore,
    private readonly ttlSeconds: number = CURSOR_TTL_SECONDS
  ) {}

  private key(job: string): string {
    return `jobs:cursor:${job}`;
  }

  async position(job: string): Promise<string | null> {
    return this.cache.get<string>(this.key(job));
  }

  async reset(job: string): Promise<void> {
    await this.cache.delete(this.key(job));
  }

  async nextPage(job: string, store: ForecastStore, limit: number): Promise<string[]> {
    const after = await this.position(job);
    let skus = await store.listActiveSkus({ after, limit });
    if (skus.length === 0 && after !== null) {
      skus = await store.listActiveSkus({ after: null, limit });
    }

    const last = skus[skus.length - 1];
    if (last === undefined || skus.length < limit) {
      await this.reset(job);
    } else {
      await this.cache.set(this.key(job), last, this.ttlSeconds);
    }
    return skus;
  }
}
