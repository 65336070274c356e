import axios, { type AxiosAdapter, type AxiosError } from 'axios';
import { z } from 'zod';
import { HttpClient } from '../services/HttpClient.js';
import { createLogger } from '../utils/logger.js';
import {
  InvalidSlugError,
  NotFoundError,
  RateLimitedError,
  UpstreamUnavailableError,
} from '../core/errors.js';
import { createQuote, type FloorPriceQuote, type LookupOptions, type PriceLookup } from '../core/types/quotes.js';
import type { MarketplaceConfig } from '../config/schema.js';

const logger = createLogger('OpenSeaClient');

const SLUG_PATTERN = /^[a-z0-9_]+(?:-[a-z0-9_]+)*$/;

export function isValidCollectionSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

// Minimal test/mocked shape
const flatStatsSchema = z.object({
  floor: z.number().nonnegative(),
  currency: z.string(),
});

// GET /api/v2/collections/{slug}/stats
const collectionStatsSchema = z.object({
  total: z.object({
    floor_price: z.number().nonnegative(),
    floor_price_symbol: z.string().default(''),
  }),
});

const statsResponseSchema = z.union([flatStatsSchema, collectionStatsSchema]);

export type StatsResponse = z.infer<typeof statsResponseSchema>;

export type OpenSeaClientConfig = Pick<
  MarketplaceConfig,
  'baseUrl' | 'statsPath' | 'apiKey' | 'defaultCurrency' | 'rateLimitFallbackMs'
>;

export class OpenSeaClient implements PriceLookup {
  private client: HttpClient;
  private now: () => Date;

  constructor(
    private config: OpenSeaClientConfig,
    options: { adapter?: AxiosAdapter; now?: () => Date } = {}
  ) {
    // Retry policy belongs to the caller
    this.client = new HttpClient('OpenSea', {
      baseURL: config.baseUrl,
      maxRetries: 0,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
        'x-api-key': config.apiKey,
      },
    });
    this.now = options.now ?? (() => new Date());
  }

  async fetchFloorPrice(collectionSlug: string, options: LookupOptions = {}): Promise<FloorPriceQuote> {
    if (!isValidCollectionSlug(collectionSlug)) {
      throw new InvalidSlugError(collectionSlug);
    }

    const path = this.config.statsPath.replace('{slug}', encodeURIComponent(collectionSlug));

    let body: unknown;
    try {
      body = await this.client.get<unknown>(path, { signal: options.signal });
    } catch (error) {
      throw this.translateError(collectionSlug, error);
    }

    const parsed = statsResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn(`Malformed stats response for ${collectionSlug}`, {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      throw new UpstreamUnavailableError(`Malformed stats response for ${collectionSlug}`, {
        cause: parsed.error,
      });
    }

    const { price, currency } = this.extractFloor(parsed.data);
    const quote = createQuote(collectionSlug, price, currency, this.now());

    logger.debug(`Floor price for ${collectionSlug}: ${price} ${currency}`);
    return quote;
  }

  private extractFloor(stats: StatsResponse): { price: number; currency: string } {
    if ('floor' in stats) {
      return { price: stats.floor, currency: stats.currency || this.config.defaultCurrency };
    }
    return {
      price: stats.total.floor_price,
      currency: stats.total.floor_price_symbol || this.config.defaultCurrency,
    };
  }

  private translateError(collectionSlug: string, error: unknown): Error {
    if (axios.isCancel(error)) {
      return new UpstreamUnavailableError(`Lookup for ${collectionSlug} was aborted`, { cause: error });
    }

    if (!axios.isAxiosError(error)) {
      return new UpstreamUnavailableError(`Lookup for ${collectionSlug} failed`, { cause: error });
    }

    const status = error.response?.status;

    if (status === 404) {
      return new NotFoundError(collectionSlug);
    }
    if (status === 429) {
      return new RateLimitedError(this.retryAfterMs(error));
    }
    if (status !== undefined) {
      return new UpstreamUnavailableError(`OpenSea responded with HTTP ${status}`, {
        cause: error,
        status,
      });
    }
    return new UpstreamUnavailableError(`OpenSea unreachable: ${error.code ?? error.message}`, {
      cause: error,
    });
  }

  // Retry-After is either delta-seconds or an HTTP date
  private retryAfterMs(error: AxiosError): number {
    const header: unknown = error.response?.headers['retry-after'];
    if (typeof header !== 'string' && typeof header !== 'number') {
      return this.config.rateLimitFallbackMs;
    }

    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.round(seconds * 1000);
    }

    const date = Date.parse(String(header));
    if (!Number.isNaN(date)) {
      return Math.max(0, date - this.now().getTime());
    }

    return this.config.rateLimitFallbackMs;
  }
}

export default OpenSeaClient;
