import { createLogger } from '../utils/logger.js';
import { rejectOnAbort, settlesWithin } from '../utils/timeout.js';
import { ReplyFormatter } from './formatter.js';
import { isValidCollectionSlug } from '../marketplace/OpenSeaClient.js';
import {
  NotFoundError,
  RateLimitedError,
  SendError,
  UpstreamUnavailableError,
  toError,
} from '../core/errors.js';
import type { CommandParser } from '../commands/CommandParser.js';
import type { RateLimiter } from '../services/RateLimiter.js';
import type { EventBus } from '../core/events/EventBus.js';
import type { Command } from '../core/types/commands.js';
import type { GatewayMessage, ReplySink } from '../core/types/gateway.js';
import type { FloorPriceQuote, PriceLookup } from '../core/types/quotes.js';
import type { ReplyTemplates } from '../config/schema.js';

const logger = createLogger('BotController');

export interface BotControllerDeps {
  parser: CommandParser;
  lookup: PriceLookup;
  replies: ReplySink;
  limiter: RateLimiter;
  templates: ReplyTemplates;
  lookupTimeoutMs: number;
  eventBus?: EventBus;
}

/**
 * Turns inbound chat messages into floor price replies. Lookup failures end
 * up as chat replies; nothing thrown here reaches the gateway.
 */
export class BotController {
  private formatter: ReplyFormatter;
  private inflight = new Set<AbortController>();
  private draining = false;

  constructor(private deps: BotControllerDeps) {
    this.formatter = new ReplyFormatter(deps.templates);
  }

  async handleMessage(message: GatewayMessage): Promise<void> {
    if (message.authorIsBot) {
      return;
    }

    const command = this.deps.parser.parse(message.content);
    if (!command) {
      return;
    }

    logger.info(`${command.name} "${command.argument}" from ${message.authorId} in ${message.channelId}`);
    this.deps.eventBus?.emit('command:received', {
      command,
      channelId: message.channelId,
      authorId: message.authorId,
    });

    const reply = await this.respond(command);
    await this.reply(message.channelId, reply);
  }

  private async respond(command: Command): Promise<string> {
    const slug = command.argument;

    if (slug.length === 0) {
      return this.formatter.usage(command.name);
    }
    if (!isValidCollectionSlug(slug)) {
      return this.formatter.invalidSlug(slug);
    }

    try {
      const quote = await this.deps.limiter.execute(() => this.lookupWithTimeout(slug));
      return this.formatter.success(quote);
    } catch (error) {
      const err = toError(error);
      this.deps.eventBus?.emit('lookup:failed', { collectionSlug: slug, error: err });

      if (err instanceof NotFoundError) {
        logger.info(`Collection not found: ${slug}`);
        return this.formatter.notFound(slug);
      }
      if (err instanceof RateLimitedError) {
        logger.warn(`Marketplace rate limited lookup for ${slug}, retry after ${err.retryAfterMs}ms`);
      } else if (err instanceof UpstreamUnavailableError) {
        logger.warn(`Marketplace unavailable for ${slug}: ${err.message}`, {
          cause: err.cause instanceof Error ? err.cause.message : undefined,
        });
      } else {
        logger.error(`Unexpected lookup failure for ${slug}`, { error: err.message, stack: err.stack });
      }
      return this.formatter.unavailable(slug);
    }
  }

  // The lookup gets a bounded time; past it the call is aborted and counts as upstream unavailable
  private async lookupWithTimeout(slug: string): Promise<FloorPriceQuote> {
    if (this.draining) {
      throw new UpstreamUnavailableError('Bot is shutting down');
    }

    const { lookupTimeoutMs } = this.deps;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new UpstreamUnavailableError(`Lookup for ${slug} timed out after ${lookupTimeoutMs}ms`));
    }, lookupTimeoutMs);

    this.inflight.add(controller);
    const startedAt = Date.now();

    try {
      const quote = await Promise.race([
        this.deps.lookup.fetchFloorPrice(slug, { signal: controller.signal }),
        rejectOnAbort(controller.signal),
      ]);
      this.deps.eventBus?.emit('lookup:completed', { quote, durationMs: Date.now() - startedAt });
      return quote;
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }

  private async reply(channelId: string, text: string): Promise<void> {
    try {
      await this.deps.replies.sendReply(channelId, text);
    } catch (error) {
      const err = toError(error);
      this.deps.eventBus?.emit('reply:failed', { channelId, error: err });
      if (err instanceof SendError) {
        logger.warn(`Reply to ${channelId} not delivered (${err.reason}): ${err.message}`);
      } else {
        logger.error(`Reply to ${channelId} failed`, { error: err.message });
      }
    }
  }

  getInflightCount(): number {
    return this.inflight.size;
  }

  // Let running lookups finish within the grace period, then cancel the rest
  async drain(gracePeriodMs: number): Promise<void> {
    this.draining = true;
    const idle = await settlesWithin(this.deps.limiter.onIdle(), gracePeriodMs);
    if (idle) {
      return;
    }

    logger.warn(
      `Cancelling ${this.inflight.size} lookups still running after ${gracePeriodMs}ms (${this.deps.limiter.getQueueSize()} queued)`
    );
    for (const controller of this.inflight) {
      controller.abort(new UpstreamUnavailableError('Lookup cancelled during shutdown'));
    }
  }
}

export default BotController;
