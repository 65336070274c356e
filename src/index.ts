import { createLogger, setLogLevel } from './utils/logger.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { ConfigError, TransportError } from './core/errors.js';
import { EventBus } from './core/events/EventBus.js';
import { GatewayState } from './core/types/gateway.js';
import { Database } from './storage/Database.js';
import { QuoteRepository } from './storage/repositories/QuoteRepository.js';
import { HttpClient } from './services/HttpClient.js';
import { RateLimiter } from './services/RateLimiter.js';
import { OpenSeaClient } from './marketplace/OpenSeaClient.js';
import { CachedPriceLookup } from './marketplace/CachedPriceLookup.js';
import { CommandParser } from './commands/CommandParser.js';
import { GatewaySessionManager } from './gateway/GatewaySessionManager.js';
import { BotController } from './bot/BotController.js';
import { HealthServer } from './health/HealthServer.js';

const logger = createLogger('Main');

const CACHE_PRUNE_INTERVAL_MS = 60 * 60 * 1000;
const AUTHENTICATION_FAILED = 4004;

export interface Application {
  gateway: GatewaySessionManager;
  controller: BotController;
  healthServer: HealthServer;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

// Builds every component in dependency order and wires them by hand
export function createApplication(config: AppConfig): Application {
  const eventBus = new EventBus();

  // Lookup client (with quote cache)
  const database = new Database(config.storage.databasePath);
  database.initialize();
  const quotes = new QuoteRepository(database);
  const lookup = new CachedPriceLookup(
    new OpenSeaClient(config.marketplace),
    quotes,
    config.marketplace.cacheTtlMs
  );

  // Command parser
  const parser = new CommandParser(config.bot.triggerWords);
  logger.info(`Trigger words: ${parser.getTriggerWords().join(', ')}`);

  // Gateway session
  const rest = new HttpClient('DiscordREST', {
    baseURL: config.discord.apiBaseUrl,
    timeout: 10000,
    maxRetries: config.discord.restMaxRetries,
    headers: { Authorization: `Bot ${config.discord.botToken}` },
  });
  const gateway = new GatewaySessionManager({
    token: config.discord.botToken,
    gatewayUrl: config.discord.gatewayUrl,
    intents: config.discord.intents,
    maxMessageLength: config.discord.maxMessageLength,
    helloTimeoutMs: config.discord.helloTimeoutMs,
    readyTimeoutMs: config.discord.readyTimeoutMs,
    closeTimeoutMs: config.discord.closeTimeoutMs,
    reconnect: config.discord.reconnect,
    rest,
    eventBus,
  });

  // Bot controller
  const controller = new BotController({
    parser,
    lookup,
    replies: gateway,
    limiter: new RateLimiter('lookups', {
      concurrency: config.bot.maxConcurrentLookups,
      requestsPerMinute: config.marketplace.requestsPerMinute,
    }),
    templates: config.bot.replies,
    lookupTimeoutMs: config.bot.lookupTimeoutMs,
    eventBus,
  });
  gateway.onMessage((message) => controller.handleMessage(message));

  // Liveness endpoint
  const healthServer = new HealthServer(gateway);

  eventBus.on('gateway:state', ({ current, reason }) => {
    if (current === GatewayState.FAILED) {
      logger.error(`Gateway gave up, health now DEGRADED: ${reason ?? 'unknown reason'}`);
    }
  });

  let pruneTimer: NodeJS.Timeout | null = null;

  return {
    gateway,
    controller,
    healthServer,

    async start(): Promise<void> {
      // The liveness listener runs on its own; it must answer while the gateway connects
      await healthServer.start(config.health);

      try {
        await gateway.start();
      } catch (error) {
        // A rejected token is a configuration problem; anything else stays up as DEGRADED
        if (error instanceof TransportError && error.closeCode === AUTHENTICATION_FAILED) {
          throw error;
        }
        logger.error('Gateway could not connect, serving DEGRADED health', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (config.marketplace.cacheTtlMs > 0) {
        pruneTimer = setInterval(() => lookup.prune(), CACHE_PRUNE_INTERVAL_MS);
        pruneTimer.unref();
      }

      eventBus.emit('system:ready', undefined);
    },

    async shutdown(): Promise<void> {
      eventBus.emit('system:shutdown', undefined);

      if (pruneTimer) {
        clearInterval(pruneTimer);
        pruneTimer = null;
      }

      await healthServer.stop();
      // Lookups already running get to reply before the connection goes away
      await controller.drain(config.bot.shutdownGracePeriodMs);
      await gateway.shutdown();
      database.close();
      eventBus.removeAllListeners();
    },
  };
}

async function main(): Promise<void> {
  logger.info('Starting Floor Price Bot...');

  let app: Application;
  try {
    const config = loadConfig();
    setLogLevel(config.app.logLevel);
    logger.info(`Environment: ${config.app.environment}`);
    app = createApplication(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Fatal error during startup:', error);
    }
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);

    try {
      await app.shutdown();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.start();
    logger.info('Floor Price Bot started successfully!');
  } catch (error) {
    logger.error('Fatal error:', error);
    await app.shutdown();
    process.exit(1);
  }
}

// Run the application unless imported (tests)
if (process.env['NODE_ENV'] !== 'test') {
  main().catch((error: unknown) => {
    logger.error('Unhandled error in main:', error);
    process.exit(1);
  });
}
