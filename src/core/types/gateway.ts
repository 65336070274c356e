// Gateway domain types

export enum GatewayState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  AUTHENTICATED = 'AUTHENTICATED',
  READY = 'READY',
  RECONNECTING = 'RECONNECTING',
  FAILED = 'FAILED',
}

export enum HealthStatus {
  OK = 'OK',
  DEGRADED = 'DEGRADED',
}

// Discord gateway opcodes
export enum GatewayOpcode {
  DISPATCH = 0,
  HEARTBEAT = 1,
  IDENTIFY = 2,
  RESUME = 6,
  RECONNECT = 7,
  INVALID_SESSION = 9,
  HELLO = 10,
  HEARTBEAT_ACK = 11,
}

export interface GatewayPayload {
  op: number;
  d?: unknown;
  s: number | null;
  t: string | null;
}

// Inbound "message created" event, platform-neutral
export interface GatewayMessage {
  messageId: string;
  channelId: string;
  guildId?: string;
  authorId: string;
  authorIsBot: boolean;
  content: string;
}

export type MessageHandler = (message: GatewayMessage) => Promise<void> | void;

// The only capability other components get over the gateway connection
export interface ReplySink {
  sendReply(channelId: string, text: string): Promise<void>;
}

export interface HealthSource {
  getHealth(): HealthStatus;
}
