// Marketplace domain types

export interface FloorPriceQuote {
  readonly collectionSlug: string;
  readonly priceInNativeToken: number;
  readonly currency: string;
  readonly fetchedAt: Date;
}

export interface LookupOptions {
  signal?: AbortSignal;
}

// Anything that can produce a floor price quote for a collection slug
export interface PriceLookup {
  fetchFloorPrice(collectionSlug: string, options?: LookupOptions): Promise<FloorPriceQuote>;
}

export function createQuote(
  collectionSlug: string,
  priceInNativeToken: number,
  currency: string,
  fetchedAt: Date = new Date()
): FloorPriceQuote {
  return Object.freeze({ collectionSlug, priceInNativeToken, currency, fetchedAt });
}
