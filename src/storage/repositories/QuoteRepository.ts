import { z } from 'zod';
import type { Database } from '../Database.js';
import { createLogger } from '../../utils/logger.js';
import { createQuote, type FloorPriceQuote } from '../../core/types/quotes.js';

const logger = createLogger('QuoteRepository');

const quoteRowSchema = z.object({
  collection_slug: z.string(),
  floor_price: z.number(),
  currency: z.string(),
  fetched_at: z.number(),
});

export class QuoteRepository {
  constructor(private database: Database) {}

  // Upsert the latest quote for a collection; returns how many times it has been fetched upstream
  save(quote: FloorPriceQuote): number {
    const fetchCount: unknown = this.database
      .prepare(`
        INSERT INTO floor_quotes (collection_slug, floor_price, currency, fetched_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(collection_slug) DO UPDATE SET
          floor_price = excluded.floor_price,
          currency = excluded.currency,
          fetched_at = excluded.fetched_at,
          fetch_count = floor_quotes.fetch_count + 1
        RETURNING fetch_count
      `)
      .pluck()
      .get(quote.collectionSlug, quote.priceInNativeToken, quote.currency, quote.fetchedAt.getTime());

    return typeof fetchCount === 'number' ? fetchCount : 0;
  }

  // Get the stored quote if it was fetched at or after `notBefore`
  findFresh(collectionSlug: string, notBefore: number): FloorPriceQuote | null {
    const row: unknown = this.database
      .prepare(`
        SELECT collection_slug, floor_price, currency, fetched_at
        FROM floor_quotes
        WHERE collection_slug = ? AND fetched_at >= ?
      `)
      .get(collectionSlug, notBefore);

    if (row === undefined) {
      return null;
    }

    const parsed = quoteRowSchema.safeParse(row);
    if (!parsed.success) {
      logger.warn(`Ignoring unreadable cached quote for ${collectionSlug}`);
      return null;
    }

    return createQuote(
      parsed.data.collection_slug,
      parsed.data.floor_price,
      parsed.data.currency,
      new Date(parsed.data.fetched_at)
    );
  }

  // Remove quotes fetched before the cutoff
  cleanup(olderThan: number): number {
    const result = this.database.prepare('DELETE FROM floor_quotes WHERE fetched_at < ?').run(olderThan);
    if (result.changes > 0) {
      logger.info(`Cleaned up ${result.changes} stale quotes`);
    }
    return result.changes;
  }
}

export default QuoteRepository;
