import type { ReplyTemplates } from '../config/schema.js';
import type { FloorPriceQuote } from '../core/types/quotes.js';

// Fill {name} placeholders; unknown placeholders are left as-is
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => vars[name] ?? placeholder);
}

const MIN_FIXED_PRICE = 1e-4;

// Up to four decimals, trailing zeros dropped; smaller non-zero prices keep four significant digits
export function formatPrice(price: number): string {
  if (!Number.isFinite(price)) {
    return String(price);
  }
  if (price !== 0 && Math.abs(price) < MIN_FIXED_PRICE) {
    return Number(price.toPrecision(4)).toString();
  }
  return Number(price.toFixed(4)).toString();
}

export class ReplyFormatter {
  constructor(private templates: ReplyTemplates) {}

  success(quote: FloorPriceQuote): string {
    return renderTemplate(this.templates.success, {
      slug: quote.collectionSlug,
      price: formatPrice(quote.priceInNativeToken),
      currency: quote.currency,
    });
  }

  notFound(slug: string): string {
    return renderTemplate(this.templates.notFound, { slug });
  }

  invalidSlug(slug: string): string {
    return renderTemplate(this.templates.invalidSlug, { slug });
  }

  unavailable(slug: string): string {
    return renderTemplate(this.templates.unavailable, { slug });
  }

  usage(trigger: string): string {
    return renderTemplate(this.templates.usage, { trigger });
  }
}

export default ReplyFormatter;
