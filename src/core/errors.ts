// Error taxonomy shared by every component

export abstract class BotError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends BotError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }
}

export class InvalidSlugError extends BotError {
  readonly code = 'INVALID_SLUG';

  constructor(readonly collectionSlug: string) {
    super(`Invalid collection slug: "${collectionSlug}"`);
  }
}

export class NotFoundError extends BotError {
  readonly code = 'NOT_FOUND';

  constructor(readonly collectionSlug: string) {
    super(`Collection not found: ${collectionSlug}`);
  }
}

export class UpstreamUnavailableError extends BotError {
  readonly code = 'UPSTREAM_UNAVAILABLE';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class RateLimitedError extends BotError {
  readonly code = 'RATE_LIMITED';

  constructor(readonly retryAfterMs: number) {
    super(`Rate limited by upstream, retry after ${retryAfterMs}ms`);
  }
}

export type SendFailureReason =
  | 'NOT_READY'
  | 'EMPTY_MESSAGE'
  | 'PAYLOAD_TOO_LARGE'
  | 'REJECTED'
  | 'TRANSPORT';

export class SendError extends BotError {
  readonly code = 'SEND_FAILED';
  readonly status?: number;

  constructor(
    readonly reason: SendFailureReason,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export class TransportError extends BotError {
  readonly code = 'TRANSPORT';
  readonly closeCode?: number;

  constructor(message: string, options?: { cause?: unknown; closeCode?: number }) {
    super(message, options);
    this.closeCode = options?.closeCode;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
