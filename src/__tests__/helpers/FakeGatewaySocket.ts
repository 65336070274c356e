import type { GatewaySocket, SocketFactory, SocketHandlers } from '../../gateway/socket.js';

export interface SentPayload {
  op: number;
  d: unknown;
}

// In-process stand-in for the Discord gateway end of a WebSocket
export class FakeGatewaySocket implements GatewaySocket {
  sent: SentPayload[] = [];
  closed: { code: number; reason?: string } | null = null;

  constructor(
    readonly url: string,
    private handlers: SocketHandlers
  ) {}

  send(data: string): void {
    const payload: SentPayload = JSON.parse(data);
    this.sent.push(payload);
  }

  // Client-initiated close; the close event comes straight back
  close(code: number, reason?: string): void {
    this.closed = { code, reason };
    this.handlers.onClose(code, reason ?? '');
  }

  sentOps(): number[] {
    return this.sent.map((p) => p.op);
  }

  open(): void {
    this.handlers.onOpen();
  }

  raw(data: string): void {
    this.handlers.onMessage(data);
  }

  receive(payload: { op: number; d?: unknown; s?: number | null; t?: string | null }): void {
    this.handlers.onMessage(JSON.stringify({ s: null, t: null, d: null, ...payload }));
  }

  hello(heartbeatInterval = 1000): void {
    this.receive({ op: 10, d: { heartbeat_interval: heartbeatInterval } });
  }

  dispatch(type: string, data: unknown, seq: number): void {
    this.receive({ op: 0, t: type, d: data, s: seq });
  }

  ack(): void {
    this.receive({ op: 11 });
  }

  serverClose(code: number, reason = ''): void {
    this.handlers.onClose(code, reason);
  }

  error(error: Error): void {
    this.handlers.onError(error);
  }
}

export function fakeSocketFactory(): { sockets: FakeGatewaySocket[]; factory: SocketFactory } {
  const sockets: FakeGatewaySocket[] = [];
  const factory: SocketFactory = (url, handlers) => {
    const socket = new FakeGatewaySocket(url, handlers);
    sockets.push(socket);
    return socket;
  };
  return { sockets, factory };
}
