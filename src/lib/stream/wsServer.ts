import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { PostureSessionService } from '@/lib/session/service';
import { PostureStreamConnection, type StreamTransport } from './postureStream';

export const POSTURE_STREAM_PATH = /^\/ws\/posture-stream\/([^/?#]+)\/?$/;

export const matchStreamSessionId = (url: string | undefined): string | null => {
  if (!url) return null;
  const pathname = url.split('?')[0] ?? '';
  const match = POSTURE_STREAM_PATH.exec(pathname);
  if (!match?.[1]) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
};

const rawToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

const toTransport = (socket: WebSocket): StreamTransport => ({
  send: (message) => {
    if (socket.readyState === socket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  },
  close: (code, reason) => socket.close(code, reason),
});

/** Binds one socket to a connection state machine and feeds it messages in order. */
export function bindPostureStream(
  socket: WebSocket,
  sessionId: string,
  service: PostureSessionService,
): PostureStreamConnection {
  const connection = new PostureStreamConnection(sessionId, service, toTransport(socket));
  let queue: Promise<void> = Promise.resolve();

  const enqueue = (step: () => Promise<void>) => {
    queue = queue.then(step).catch((error: unknown) => {
      console.error(`[posture-stream] Unhandled error for ${sessionId}:`, error);
    });
  };

  connection.open();

  socket.on('message', (data) => {
    enqueue(() => connection.receive(rawToString(data)));
  });
  socket.on('close', () => {
    enqueue(() => connection.disconnect());
  });
  socket.on('error', (error) => {
    console.error(`[posture-stream] Socket error for ${sessionId}:`, error);
  });

  return connection;
}

/**
 * WebSocket endpoint for `/ws/posture-stream/:sessionId`.
 * `handleUpgrade` returns false for any other path so the caller can pass it on.
 */
export function createPostureStreamServer(service: PostureSessionService) {
  const wss = new WebSocketServer({ noServer: true });

  const handleUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): boolean => {
    const sessionId = matchStreamSessionId(request.url);
    if (!sessionId) {
      return false;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      bindPostureStream(ws, sessionId, service);
    });
    return true;
  };

  return {
    handleUpgrade,
    close: () =>
      new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
