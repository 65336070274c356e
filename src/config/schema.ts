import { z } from 'zod';

// Discord intents: GUILDS | GUILD_MESSAGES | MESSAGE_CONTENT
const DEFAULT_INTENTS = (1 << 0) | (1 << 9) | (1 << 15);

const reconnectSchema = z.object({
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(30000),
  multiplier: z.number().min(1).default(2),
  jitterRatio: z.number().min(0).max(1).default(0.25),
  maxAttempts: z.number().int().min(1).default(10),
});

// Main configuration schema
export const configSchema = z.object({
  app: z
    .object({
      name: z.string().default('Floor Price Bot'),
      environment: z.enum(['development', 'production', 'test']).default('development'),
      logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),

  bot: z
    .object({
      triggerWords: z.array(z.string().min(1).regex(/^\S+$/, 'Trigger words cannot contain whitespace')).min(1).default(['f']),
      lookupTimeoutMs: z.number().min(100).default(5000),
      maxConcurrentLookups: z.number().int().min(1).default(4),
      shutdownGracePeriodMs: z.number().min(0).default(5000),
      replies: z
        .object({
          success: z.string().default('Floor price for **{slug}**: {price} {currency}'),
          notFound: z.string().default('Collection `{slug}` not found.'),
          invalidSlug: z.string().default('`{slug}` is not a valid collection slug.'),
          unavailable: z.string().default("Couldn't fetch the floor price for `{slug}` right now, try again later."),
          usage: z.string().default('Usage: `{trigger} <collection-slug>`'),
        })
        .default({}),
    })
    .default({}),

  discord: z.object({
    botToken: z.string().min(1, 'Discord bot token is required'),
    gatewayUrl: z.string().url().default('wss://gateway.discord.gg/?v=10&encoding=json'),
    apiBaseUrl: z.string().url().default('https://discord.com/api/v10'),
    intents: z.number().int().min(0).default(DEFAULT_INTENTS),
    maxMessageLength: z.number().int().min(1).max(2000).default(2000),
    helloTimeoutMs: z.number().min(100).default(10000),
    readyTimeoutMs: z.number().min(0).default(15000),
    closeTimeoutMs: z.number().min(0).default(1000),
    restMaxRetries: z.number().int().min(0).default(2),
    reconnect: reconnectSchema.default({}),
  }),

  marketplace: z.object({
    baseUrl: z.string().url().default('https://api.opensea.io/api/v2'),
    statsPath: z.string().includes('{slug}').default('/collections/{slug}/stats'),
    apiKey: z.string().min(1, 'Marketplace API key is required'),
    defaultCurrency: z.string().min(1).default('ETH'),
    requestsPerMinute: z.number().int().min(1).default(60),
    rateLimitFallbackMs: z.number().min(0).default(60000),
    cacheTtlMs: z.number().min(0).default(30000),
  }),

  health: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
    })
    .default({}),

  storage: z
    .object({
      databasePath: z.string().default('./data/floor_bot.db'),
    })
    .default({}),
});

// Infer types from schemas
export type AppConfig = z.infer<typeof configSchema>;
export type BotConfig = AppConfig['bot'];
export type ReplyTemplates = BotConfig['replies'];
export type DiscordConfig = AppConfig['discord'];
export type ReconnectConfig = z.infer<typeof reconnectSchema>;
export type MarketplaceConfig = AppConfig['marketplace'];
export type HealthConfig = AppConfig['health'];
