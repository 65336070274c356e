import WebSocket from 'ws';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

// The slice of a WebSocket the session manager needs
export interface GatewaySocket {
  send(data: string): void;
  close(code: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => GatewaySocket;

function decode(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export const createWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(decode(data)));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.onError(error));

  return {
    send(data: string): void {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(data);
      }
    },
    close(code: number, reason?: string): void {
      if (ws.readyState === WebSocket.CLOSED) {
        return;
      }
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
        return;
      }
      ws.close(code, reason);
    },
  };
};
