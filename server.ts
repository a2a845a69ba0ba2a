import { createServer } from 'node:http';
import next from 'next';
import { getServerEnv } from '@/lib/env/server';
import { createPostureSessionService, registerPostureSessionService } from '@/lib/runtime';
import { createPostureStreamServer } from '@/lib/stream/wsServer';

async function main() {
  const env = getServerEnv();
  const dev = process.env.NODE_ENV !== 'production';

  const app = next({ dev, hostname: env.HOST, port: env.PORT });
  const handle = app.getRequestHandler();
  await app.prepare();

  // The same service backs the HTTP routes and the stream endpoint.
  const service = createPostureSessionService();
  registerPostureSessionService(service);

  const streams = createPostureStreamServer(service);
  const upgradeNext = app.getUpgradeHandler();

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      console.error('[server] Request failed:', error);
      res.statusCode = 500;
      res.end('Internal server error');
    });
  });

  server.on('upgrade', (request, socket, head) => {
    if (streams.handleUpgrade(request, socket, head)) {
      return;
    }
    upgradeNext(request, socket, head).catch((error: unknown) => {
      console.error('[server] Upgrade failed:', error);
      socket.destroy();
    });
  });

  server.listen(env.PORT, env.HOST, () => {
    console.info(`[server] Listening on http://${env.HOST}:${env.PORT} (stream: /ws/posture-stream/:sessionId)`);
  });

  const shutdown = () => {
    console.info('[server] Shutting down');
    streams
      .close()
      .catch((error: unknown) => console.error('[server] Stream server close failed:', error))
      .finally(() => server.close(() => process.exit(0)));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[server] Failed to start:', error);
  process.exit(1);
});
