import { createLogger } from '../utils/logger.js';
import type { QuoteRepository } from '../storage/repositories/QuoteRepository.js';
import type { FloorPriceQuote, LookupOptions, PriceLookup } from '../core/types/quotes.js';

const logger = createLogger('CachedPriceLookup');

/**
 * Serves recent quotes from the quote repository and stores every fresh fetch.
 * A TTL of 0 disables cache reads; failed lookups are never stored.
 */
export class CachedPriceLookup implements PriceLookup {
  constructor(
    private inner: PriceLookup,
    private repository: QuoteRepository,
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  async fetchFloorPrice(collectionSlug: string, options?: LookupOptions): Promise<FloorPriceQuote> {
    if (this.ttlMs > 0) {
      const cached = this.repository.findFresh(collectionSlug, this.now() - this.ttlMs);
      if (cached) {
        logger.debug(`Cache hit for ${collectionSlug}`);
        return cached;
      }
    }

    const quote = await this.inner.fetchFloorPrice(collectionSlug, options);
    const fetchCount = this.repository.save(quote);
    logger.debug(`Stored quote for ${collectionSlug} (upstream fetch #${fetchCount})`);
    return quote;
  }

  // Drop entries that can no longer be served
  prune(): number {
    return this.repository.cleanup(this.now() - this.ttlMs);
  }
}

export default CachedPriceLookup;
