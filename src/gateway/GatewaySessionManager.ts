import axios from 'axios';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { settlesWithin } from '../utils/timeout.js';
import { computeBackoffDelay } from './backoff.js';
import { createWebSocket, type GatewaySocket, type SocketFactory } from './socket.js';
import { SendError, TransportError, toError } from '../core/errors.js';
import {
  GatewayOpcode,
  GatewayState,
  HealthStatus,
  type GatewayMessage,
  type GatewayPayload,
  type HealthSource,
  type MessageHandler,
  type ReplySink,
} from '../core/types/gateway.js';
import type { EventBus } from '../core/events/EventBus.js';
import type { ReconnectConfig } from '../config/schema.js';

const logger = createLogger('GatewaySession');

// Closing with 1000 tells Discord to drop the session; anything else keeps it resumable
const NORMAL_CLOSE = 1000;
const RESUMABLE_CLOSE = 4000;

// Authentication failed, invalid shard, sharding required, invalid API version, invalid/disallowed intents
const FATAL_CLOSE_CODES = new Set([4004, 4010, 4011, 4012, 4013, 4014]);
// Invalid seq, session timed out
const SESSION_RESET_CLOSE_CODES = new Set([4007, 4009]);

const MAX_MISSED_ACKS = 2;
// Events replayed on resume or received before READY wait here until READY
const MAX_BUFFERED_MESSAGES = 100;

const TRANSITIONS: Record<GatewayState, readonly GatewayState[]> = {
  [GatewayState.DISCONNECTED]: [GatewayState.CONNECTING],
  [GatewayState.CONNECTING]: [
    GatewayState.AUTHENTICATED,
    GatewayState.RECONNECTING,
    GatewayState.FAILED,
    GatewayState.DISCONNECTED,
  ],
  [GatewayState.AUTHENTICATED]: [
    GatewayState.READY,
    GatewayState.RECONNECTING,
    GatewayState.FAILED,
    GatewayState.DISCONNECTED,
  ],
  [GatewayState.READY]: [GatewayState.RECONNECTING, GatewayState.FAILED, GatewayState.DISCONNECTED],
  [GatewayState.RECONNECTING]: [GatewayState.CONNECTING, GatewayState.FAILED, GatewayState.DISCONNECTED],
  [GatewayState.FAILED]: [GatewayState.DISCONNECTED],
};

const payloadSchema = z.object({
  op: z.number().int(),
  d: z.unknown(),
  s: z.number().int().nullable().default(null),
  t: z.string().nullable().default(null),
});

const helloSchema = z.object({
  heartbeat_interval: z.number().positive(),
});

const readySchema = z.object({
  session_id: z.string(),
  resume_gateway_url: z.string().optional(),
  user: z.object({ id: z.string() }),
  guilds: z.array(z.object({ id: z.string() })).default([]),
});

const guildCreateSchema = z.object({ id: z.string() });

const messageCreateSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  guild_id: z.string().optional(),
  content: z.string().default(''),
  author: z.object({
    id: z.string(),
    bot: z.boolean().optional(),
  }),
});

// The REST call the manager needs for replies; HttpClient satisfies it
export interface RestClient {
  post<T>(url: string, data?: unknown): Promise<T>;
}

export interface GatewaySessionOptions {
  token: string;
  gatewayUrl: string;
  intents: number;
  maxMessageLength: number;
  helloTimeoutMs: number;
  readyTimeoutMs: number;
  closeTimeoutMs: number;
  reconnect: ReconnectConfig;
  rest: RestClient;
  eventBus?: EventBus;
  socketFactory?: SocketFactory;
  random?: () => number;
}

interface ReadyWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Owns the single Discord gateway connection: handshake, heartbeats,
 * resume/reconnect with backoff, and relaying MESSAGE_CREATE events while READY.
 * Other components only see {@link ReplySink} and the message callback.
 */
export class GatewaySessionManager implements ReplySink, HealthSource {
  private state = GatewayState.DISCONNECTED;
  private socket: GatewaySocket | null = null;
  private generation = 0;
  private stopping = false;

  private sessionId: string | null = null;
  private resumeUrl: string | null = null;
  private sequence: number | null = null;
  private selfUserId: string | null = null;
  private pendingGuilds = new Set<string>();

  private helloTimer: NodeJS.Timeout | null = null;
  private heartbeatStartTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readyTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private missedAcks = 0;
  private reconnectAttempts = 0;

  private messageHandler: MessageHandler | null = null;
  private bufferedMessages: GatewayMessage[] = [];
  private readyWaiters: ReadyWaiter[] = [];
  private closeWaiters = new Map<number, () => void>();

  private socketFactory: SocketFactory;
  private random: () => number;

  constructor(private options: GatewaySessionOptions) {
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.random = options.random ?? Math.random;
  }

  getState(): GatewayState {
    return this.state;
  }

  getHealth(): HealthStatus {
    return this.state === GatewayState.FAILED ? HealthStatus.DEGRADED : HealthStatus.OK;
  }

  getSelfUserId(): string | null {
    return this.selfUserId;
  }

  // Registered once; survives reconnects
  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  // Resolves on the first READY; rejects if the session fails before that
  start(): Promise<void> {
    if (this.state !== GatewayState.DISCONNECTED) {
      return Promise.reject(new Error(`Cannot start gateway session from state ${this.state}`));
    }

    this.stopping = false;
    this.reconnectAttempts = 0;

    const ready = new Promise<void>((resolve, reject) => {
      this.readyWaiters.push({ resolve, reject });
    });
    this.connect();
    return ready;
  }

  async sendReply(channelId: string, text: string): Promise<void> {
    if (this.state !== GatewayState.READY) {
      throw new SendError('NOT_READY', `Cannot send while gateway is ${this.state}`);
    }
    if (text.trim().length === 0) {
      throw new SendError('EMPTY_MESSAGE', 'Refusing to send an empty message');
    }
    if (text.length > this.options.maxMessageLength) {
      throw new SendError(
        'PAYLOAD_TOO_LARGE',
        `Message is ${text.length} characters, limit is ${this.options.maxMessageLength}`
      );
    }

    try {
      await this.options.rest.post(`/channels/${encodeURIComponent(channelId)}/messages`, {
        content: text,
        allowed_mentions: { parse: [] },
      });
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status !== undefined && status < 500) {
        throw new SendError('REJECTED', `Discord rejected message to ${channelId}: HTTP ${status}`, {
          cause: error,
          status,
        });
      }
      throw new SendError('TRANSPORT', `Failed to deliver message to ${channelId}`, { cause: error, status });
    }
  }

  // Sends a normal close frame so Discord drops the session, then waits briefly for the close
  async shutdown(): Promise<void> {
    this.stopping = true;
    this.clearReconnectTimer();

    const socket = this.socket;
    const generation = this.generation;
    const closed = new Promise<void>((resolve) => {
      this.closeWaiters.set(generation, resolve);
    });

    this.teardownConnection();
    if (this.state !== GatewayState.DISCONNECTED) {
      this.transition(GatewayState.DISCONNECTED, 'shutdown');
    }
    this.settleReadyWaiters();

    if (socket) {
      socket.close(NORMAL_CLOSE, 'shutdown');
      const clean = await settlesWithin(closed, this.options.closeTimeoutMs);
      if (!clean) {
        logger.warn(`Gateway did not confirm close within ${this.options.closeTimeoutMs}ms`);
      }
    }
    this.closeWaiters.clear();
    this.clearSession();
    this.bufferedMessages = [];
  }

  private connect(): void {
    this.transition(GatewayState.CONNECTING);

    const generation = ++this.generation;
    const url = this.connectUrl();
    this.missedAcks = 0;

    logger.info(`Connecting to gateway ${url}`);

    this.helloTimer = setTimeout(() => {
      this.helloTimer = null;
      logger.warn(`No HELLO within ${this.options.helloTimeoutMs}ms`);
      this.dropConnection('hello timeout');
    }, this.options.helloTimeoutMs);

    try {
      this.socket = this.socketFactory(url, {
        onOpen: () => {
          if (generation === this.generation) {
            logger.debug('Gateway socket open');
          }
        },
        onMessage: (data) => {
          if (generation === this.generation) {
            this.handleRaw(data);
          }
        },
        onClose: (code, reason) => {
          this.closeWaiters.get(generation)?.();
          this.closeWaiters.delete(generation);
          if (generation === this.generation) {
            this.handleClose(code, reason);
          }
        },
        onError: (error) => {
          if (generation === this.generation) {
            this.handleTransportFailure(new TransportError(`Gateway socket error: ${error.message}`, { cause: error }));
          }
        },
      });
    } catch (error) {
      this.handleTransportFailure(new TransportError('Failed to open gateway socket', { cause: error }));
    }
  }

  private connectUrl(): string {
    if (!this.resumeUrl || !this.canResume()) {
      return this.options.gatewayUrl;
    }
    // resume_gateway_url comes without the version/encoding query
    const url = new URL(this.resumeUrl);
    url.search = new URL(this.options.gatewayUrl).search;
    return url.toString();
  }

  private canResume(): boolean {
    return this.sessionId !== null && this.sequence !== null;
  }

  private handleRaw(data: string): void {
    let payload: GatewayPayload;
    try {
      const parsed = payloadSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logger.warn('Ignoring malformed gateway payload');
        return;
      }
      payload = parsed.data;
    } catch (error) {
      logger.warn('Ignoring non-JSON gateway frame', { error: toError(error).message });
      return;
    }

    if (payload.s !== null) {
      this.sequence = payload.s;
    }

    switch (payload.op) {
      case GatewayOpcode.HELLO:
        this.handleHello(payload.d);
        break;

      case GatewayOpcode.HEARTBEAT_ACK:
        this.missedAcks = 0;
        break;

      case GatewayOpcode.HEARTBEAT:
        this.sendHeartbeat();
        break;

      case GatewayOpcode.RECONNECT:
        logger.info('Gateway requested reconnect');
        this.dropConnection('server requested reconnect');
        break;

      case GatewayOpcode.INVALID_SESSION:
        if (payload.d !== true) {
          this.clearSession();
        }
        logger.warn(`Invalid session (resumable: ${payload.d === true})`);
        this.dropConnection('invalid session');
        break;

      case GatewayOpcode.DISPATCH:
        if (payload.t) {
          this.handleDispatch(payload.t, payload.d);
        }
        break;

      default:
        logger.debug(`Unhandled gateway opcode ${payload.op}`);
    }
  }

  private handleHello(data: unknown): void {
    this.clearHelloTimer();
    const hello = helloSchema.safeParse(data);
    if (!hello.success) {
      this.handleTransportFailure(new TransportError('Malformed HELLO payload'));
      return;
    }

    this.startHeartbeat(hello.data.heartbeat_interval);

    if (this.canResume()) {
      logger.info(`Resuming session ${this.sessionId} at seq ${this.sequence}`);
      this.send({
        op: GatewayOpcode.RESUME,
        d: { token: this.options.token, session_id: this.sessionId, seq: this.sequence },
      });
    } else {
      // A fresh session gets no replay; anything held belongs to the old one
      this.bufferedMessages = [];
      this.send({
        op: GatewayOpcode.IDENTIFY,
        d: {
          token: this.options.token,
          intents: this.options.intents,
          properties: { os: process.platform, browser: 'floor-price-bot', device: 'floor-price-bot' },
        },
      });
    }
  }

  private handleDispatch(type: string, data: unknown): void {
    switch (type) {
      case 'READY': {
        const ready = readySchema.safeParse(data);
        if (!ready.success || this.state !== GatewayState.CONNECTING) {
          logger.warn(`Unexpected READY in state ${this.state}`);
          return;
        }
        this.sessionId = ready.data.session_id;
        this.resumeUrl = ready.data.resume_gateway_url ?? null;
        this.selfUserId = ready.data.user.id;
        this.pendingGuilds = new Set(ready.data.guilds.map((g) => g.id));
        this.transition(GatewayState.AUTHENTICATED, 'identified');
        this.awaitInitialSync();
        break;
      }

      case 'RESUMED':
        if (this.state !== GatewayState.CONNECTING) {
          return;
        }
        this.transition(GatewayState.AUTHENTICATED, 'resumed');
        this.markReady();
        break;

      case 'GUILD_CREATE': {
        const guild = guildCreateSchema.safeParse(data);
        if (guild.success && this.state === GatewayState.AUTHENTICATED) {
          this.pendingGuilds.delete(guild.data.id);
          if (this.pendingGuilds.size === 0) {
            this.markReady();
          }
        }
        break;
      }

      case 'MESSAGE_CREATE':
        this.handleMessageCreate(data);
        break;

      default:
        break;
    }
  }

  private awaitInitialSync(): void {
    if (this.pendingGuilds.size === 0) {
      this.markReady();
      return;
    }

    logger.debug(`Waiting for ${this.pendingGuilds.size} guilds to sync`);
    this.readyTimer = setTimeout(() => {
      this.readyTimer = null;
      logger.warn(`${this.pendingGuilds.size} guilds still unavailable after ${this.options.readyTimeoutMs}ms`);
      this.markReady();
    }, this.options.readyTimeoutMs);
  }

  private markReady(): void {
    this.clearReadyTimer();
    if (this.state !== GatewayState.AUTHENTICATED) {
      return;
    }

    this.transition(GatewayState.READY);
    this.reconnectAttempts = 0;

    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.resolve();
    }

    const buffered = this.bufferedMessages.splice(0);
    if (buffered.length > 0) {
      logger.info(`Delivering ${buffered.length} messages received before READY`);
    }
    for (const message of buffered) {
      this.deliver(message);
    }
  }

  private handleMessageCreate(data: unknown): void {
    const parsed = messageCreateSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Ignoring malformed MESSAGE_CREATE');
      return;
    }

    const message: GatewayMessage = {
      messageId: parsed.data.id,
      channelId: parsed.data.channel_id,
      guildId: parsed.data.guild_id,
      authorId: parsed.data.author.id,
      authorIsBot: parsed.data.author.bot ?? false,
      content: parsed.data.content,
    };

    if (this.state === GatewayState.READY) {
      this.deliver(message);
      return;
    }
    if (this.state !== GatewayState.CONNECTING && this.state !== GatewayState.AUTHENTICATED) {
      logger.debug(`Dropping MESSAGE_CREATE received while ${this.state}`);
      return;
    }

    if (this.bufferedMessages.length >= MAX_BUFFERED_MESSAGES) {
      const dropped = this.bufferedMessages.shift();
      logger.warn(`Message buffer full, dropping ${dropped?.messageId ?? 'oldest message'}`);
    }
    this.bufferedMessages.push(message);
  }

  private deliver(message: GatewayMessage): void {
    const handler = this.messageHandler;
    if (!handler) {
      return;
    }

    Promise.resolve()
      .then(() => handler(message))
      .catch((error: unknown) => {
        logger.error(`Message handler failed for ${message.messageId}`, { error: toError(error).message });
      });
  }

  private startHeartbeat(intervalMs: number): void {
    this.stopHeartbeat();

    // First beat is jittered so reconnecting clients don't beat in lockstep
    this.heartbeatStartTimer = setTimeout(() => {
      this.heartbeatStartTimer = null;
      this.beat();
      this.heartbeatTimer = setInterval(() => this.beat(), intervalMs);
    }, Math.floor(intervalMs * this.random()));
  }

  private beat(): void {
    if (this.missedAcks >= MAX_MISSED_ACKS) {
      logger.warn(`No heartbeat ACK for ${this.missedAcks} heartbeats, reconnecting`);
      this.dropConnection('heartbeat timeout');
      return;
    }
    this.sendHeartbeat();
  }

  private sendHeartbeat(): void {
    this.missedAcks++;
    this.send({ op: GatewayOpcode.HEARTBEAT, d: this.sequence });
  }

  private stopHeartbeat(): void {
    if (this.heartbeatStartTimer) {
      clearTimeout(this.heartbeatStartTimer);
      this.heartbeatStartTimer = null;
    }
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private send(payload: { op: GatewayOpcode; d: unknown }): void {
    this.socket?.send(JSON.stringify(payload));
  }

  private handleClose(code: number, reason: string): void {
    this.teardownConnection();

    if (this.stopping) {
      return;
    }

    logger.warn(`Gateway closed: ${code}${reason ? ` ${reason}` : ''}`);

    if (FATAL_CLOSE_CODES.has(code)) {
      this.fail(new TransportError(`Gateway closed with non-recoverable code ${code}`, { closeCode: code }));
      return;
    }
    if (SESSION_RESET_CLOSE_CODES.has(code)) {
      this.clearSession();
    }

    this.scheduleReconnect(`socket closed (${code})`);
  }

  private handleTransportFailure(error: TransportError): void {
    logger.warn(error.message);
    this.dropConnection('transport error');
  }

  // Abandon the current socket, keeping the session resumable
  private dropConnection(reason: string): void {
    const socket = this.socket;
    this.teardownConnection();
    socket?.close(RESUMABLE_CLOSE, reason);
    this.scheduleReconnect(reason);
  }

  private teardownConnection(): void {
    this.clearHelloTimer();
    this.stopHeartbeat();
    this.clearReadyTimer();
    this.socket = null;
    this.generation++;
  }

  private scheduleReconnect(reason: string): void {
    if (this.stopping) {
      return;
    }

    const { maxAttempts } = this.options.reconnect;
    this.reconnectAttempts++;

    if (this.reconnectAttempts > maxAttempts) {
      this.fail(new TransportError(`Gave up after ${maxAttempts} reconnect attempts (${reason})`));
      return;
    }

    this.transition(GatewayState.RECONNECTING, reason);

    const delay = computeBackoffDelay(this.reconnectAttempts, this.options.reconnect, this.random);
    logger.info(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${maxAttempts})`);

    this.clearReconnectTimer();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private fail(error: TransportError): void {
    this.clearReconnectTimer();
    this.teardownConnection();
    this.transition(GatewayState.FAILED, error.message);
    logger.error(`Gateway session failed: ${error.message}`);
    this.bufferedMessages = [];

    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.reject(error);
    }
  }

  private settleReadyWaiters(): void {
    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.resolve();
    }
  }

  private clearSession(): void {
    this.sessionId = null;
    this.resumeUrl = null;
    this.sequence = null;
  }

  private clearHelloTimer(): void {
    if (this.helloTimer) {
      clearTimeout(this.helloTimer);
      this.helloTimer = null;
    }
  }

  private clearReadyTimer(): void {
    if (this.readyTimer) {
      clearTimeout(this.readyTimer);
      this.readyTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private transition(next: GatewayState, reason?: string): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid gateway transition ${previous} -> ${next}`);
    }

    this.state = next;
    logger.info(`${previous} -> ${next}${reason ? ` (${reason})` : ''}`);
    this.options.eventBus?.emit('gateway:state', { previous, current: next, reason });
  }
}

export default GatewaySessionManager;
