import WebSocket from 'ws';

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
}

/** One physical connection. A transport is never reopened; make a new one. */
export interface SyncTransport {
  send(data: string, callback: (err?: Error) => void): void;
  /** Graceful close; onClose follows. */
  close(): void;
  /** Immediate teardown for a connection already considered dead. */
  terminate(): void;
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => SyncTransport;

export interface WsTransportOptions {
  handshakeTimeoutMs?: number;
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function createWsTransportFactory(options: WsTransportOptions = {}): TransportFactory {
  return (url, handlers) => {
    const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs ?? 10_000 });

    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data) => handlers.onMessage(rawToString(data)));
    socket.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
    socket.on('error', (err) => handlers.onError(err));

    return {
      send(data, callback) {
        if (socket.readyState !== WebSocket.OPEN) {
          callback(new Error(`socket not open (readyState ${socket.readyState})`));
          return;
        }
        socket.send(data, callback);
      },
      close() {
        socket.close();
      },
      terminate() {
        socket.terminate();
      },
    };
  };
}
