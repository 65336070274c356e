import { EventEmitter } from 'events';
import type { Command } from '../types/commands.js';
import type { GatewayState } from '../types/gateway.js';
import type { FloorPriceQuote } from '../types/quotes.js';

// Event type definitions
export interface EventMap {
  // Gateway lifecycle
  'gateway:state': { previous: GatewayState; current: GatewayState; reason?: string };

  // Command handling
  'command:received': { command: Command; channelId: string; authorId: string };
  'lookup:completed': { quote: FloorPriceQuote; durationMs: number };
  'lookup:failed': { collectionSlug: string; error: Error };
  'reply:failed': { channelId: string; error: Error };

  // System events
  'system:ready': undefined;
  'system:shutdown': undefined;
}

type Listener<K extends keyof EventMap> = (payload: EventMap[K]) => void;

// Type-safe event emitter
export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  on<K extends keyof EventMap>(event: K, listener: Listener<K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

export default EventBus;
