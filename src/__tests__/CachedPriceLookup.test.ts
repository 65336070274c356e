import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Database } from '../storage/Database.js';
import { QuoteRepository } from '../storage/repositories/QuoteRepository.js';
import { CachedPriceLookup } from '../marketplace/CachedPriceLookup.js';
import { createQuote, type PriceLookup } from '../core/types/quotes.js';
import { NotFoundError } from '../core/errors.js';

const FETCHED_AT = 1_000_000;
const TTL = 30_000;

describe('QuoteRepository', () => {
  let database: Database;
  let repository: QuoteRepository;

  beforeEach(() => {
    database = new Database(':memory:');
    database.initialize();
    repository = new QuoteRepository(database);
  });

  afterEach(() => {
    database.close();
  });

  it('returns a stored quote fetched at or after the cutoff', () => {
    repository.save(createQuote('azuki', 3.25, 'ETH', new Date(FETCHED_AT)));

    expect(repository.findFresh('azuki', FETCHED_AT)).toEqual({
      collectionSlug: 'azuki',
      priceInNativeToken: 3.25,
      currency: 'ETH',
      fetchedAt: new Date(FETCHED_AT),
    });
    expect(repository.findFresh('azuki', FETCHED_AT + 1)).toBeNull();
    expect(repository.findFresh('unknown', 0)).toBeNull();
  });

  it('keeps only the latest quote and counts upstream fetches', () => {
    expect(repository.save(createQuote('azuki', 3.25, 'ETH', new Date(FETCHED_AT)))).toBe(1);
    expect(repository.save(createQuote('azuki', 3.5, 'ETH', new Date(FETCHED_AT + 10)))).toBe(2);
    expect(repository.save(createQuote('boredapeyachtclub', 80.5, 'ETH', new Date(FETCHED_AT)))).toBe(1);

    expect(repository.findFresh('azuki', 0)?.priceInNativeToken).toBe(3.5);
  });

  it('removes quotes older than the cutoff', () => {
    repository.save(createQuote('azuki', 3.25, 'ETH', new Date(FETCHED_AT)));
    repository.save(createQuote('boredapeyachtclub', 80.5, 'ETH', new Date(FETCHED_AT + 5000)));

    expect(repository.cleanup(FETCHED_AT + 1)).toBe(1);
    expect(repository.findFresh('azuki', 0)).toBeNull();
    expect(repository.findFresh('boredapeyachtclub', 0)).not.toBeNull();
  });
});

describe('CachedPriceLookup', () => {
  let database: Database;
  let repository: QuoteRepository;
  let now: number;
  const fetchFloorPrice = vi.fn<PriceLookup['fetchFloorPrice']>();

  beforeEach(() => {
    database = new Database(':memory:');
    database.initialize();
    repository = new QuoteRepository(database);
    now = FETCHED_AT;
    fetchFloorPrice.mockReset();
    fetchFloorPrice.mockResolvedValue(createQuote('azuki', 3.25, 'ETH', new Date(FETCHED_AT)));
  });

  afterEach(() => {
    database.close();
  });

  function createLookup(ttlMs = TTL) {
    return new CachedPriceLookup({ fetchFloorPrice }, repository, ttlMs, () => now);
  }

  it('serves a repeated lookup from the cache within the TTL', async () => {
    const lookup = createLookup();
    const save = vi.spyOn(repository, 'save');

    await lookup.fetchFloorPrice('azuki');
    now = FETCHED_AT + 10_000;
    const cached = await lookup.fetchFloorPrice('azuki');

    expect(fetchFloorPrice).toHaveBeenCalledTimes(1);
    expect(save).toHaveBeenCalledTimes(1);
    expect(cached.priceInNativeToken).toBe(3.25);
    expect(cached.fetchedAt).toEqual(new Date(FETCHED_AT));
  });

  it('fetches again once the cached quote has expired', async () => {
    const lookup = createLookup();
    const save = vi.spyOn(repository, 'save');

    await lookup.fetchFloorPrice('azuki');
    now = FETCHED_AT + TTL + 1_000;
    await lookup.fetchFloorPrice('azuki');

    expect(fetchFloorPrice).toHaveBeenCalledTimes(2);
    expect(save.mock.results.map((result) => result.value)).toEqual([1, 2]);
  });

  it('always fetches when the TTL is zero', async () => {
    const lookup = createLookup(0);

    await lookup.fetchFloorPrice('azuki');
    await lookup.fetchFloorPrice('azuki');

    expect(fetchFloorPrice).toHaveBeenCalledTimes(2);
  });

  it('passes the abort signal through', async () => {
    const lookup = createLookup();
    const controller = new AbortController();

    await lookup.fetchFloorPrice('azuki', { signal: controller.signal });

    expect(fetchFloorPrice).toHaveBeenCalledWith('azuki', { signal: controller.signal });
  });

  it('does not cache failures', async () => {
    const lookup = createLookup();
    fetchFloorPrice.mockRejectedValue(new NotFoundError('azuki'));

    await expect(lookup.fetchFloorPrice('azuki')).rejects.toBeInstanceOf(NotFoundError);
    await expect(lookup.fetchFloorPrice('azuki')).rejects.toBeInstanceOf(NotFoundError);

    expect(fetchFloorPrice).toHaveBeenCalledTimes(2);
    expect(repository.findFresh('azuki', 0)).toBeNull();
  });

  it('prunes quotes past the TTL', async () => {
    const lookup = createLookup();
    await lookup.fetchFloorPrice('azuki');

    now = FETCHED_AT + TTL + 1;

    expect(lookup.prune()).toBe(1);
    expect(repository.findFresh('azuki', 0)).toBeNull();
  });
});
