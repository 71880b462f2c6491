import { readFileSync, existsSync, statSync } from 'node:fs';
import { resolve, join, extname } from 'node:path';
import pino from 'pino';
import { buildServer } from './app.js';
import {
  createDbClient,
  createDrizzleRepository,
  createCaseConfigSender,
  createRedisClient,
  publishConfigUpdate,
  startConfigUpdateSubscriber,
  loadAppConfig,
} from './infrastructure/index.js';
import { ConfigUpdateSocketServer } from './interfaces/ws/index.js';

const MIME: Record<string, string> = {
  '.html': 'text/html',
  '.js': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.map': 'application/json',
};

/**
 * Bootstrap the HTTP server.
 *
 * Order:
 * 1) Config + infrastructure clients
 * 2) Routes (via buildServer) and the SPA
 * 3) Shutdown hooks
 * 4) listen()
 * 5) WebSocket relay + Redis subscriber
 */
async function main(): Promise<void> {
  const config = loadAppConfig();
  const log = pino({ level: config.logLevel });

  const { sql, db } = createDbClient(config.databaseUrl, { log });
  const redis = createRedisClient(config.redisUrl);
  await redis.connect();
  log.info('Redis connected');

  const fastify = await buildServer(
    {
      repository: createDrizzleRepository(db),
      sender: createCaseConfigSender(config.caseConfigEndpoint, log),
      notify: (event) => publishConfigUpdate(redis, log, event),
    },
    { logger: log },
  );

  // --------------------------------------------------
  // UI: serve the built React app from public/dist/
  // --------------------------------------------------

  const distDir = resolve(process.cwd(), 'public', 'dist');

  fastify.get('/', (_req, reply) => {
    try {
      const html = readFileSync(resolve(distDir, 'index.html'), 'utf-8');
      return reply.type('text/html').send(html);
    } catch {
      fastify.log.warn('UI build not found at public/dist/index.html');
      return reply.status(404).send({ error: 'UI not found (run: npm run build:frontend)' });
    }
  });

  fastify.get('/assets/*', (req, reply) => {
    const urlPath = (req.url.split('?')[0] ?? '').replace(/^\//, '');
    const filePath = join(distDir, urlPath);

    if (!filePath.startsWith(distDir)) {
      return reply.status(403).send({ error: 'Forbidden' });
    }
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      return reply.status(404).send({ error: 'Not found' });
    }
    const mime = MIME[extname(filePath)] ?? 'application/octet-stream';
    return reply.type(mime).send(readFileSync(filePath));
  });

  let wsServer: ConfigUpdateSocketServer | null = null;
  let stopSubscriber: null | (() => Promise<void>) = null;

  // onClose MUST be registered before listen()
  fastify.addHook('onClose', async () => {
    wsServer?.close();
    if (stopSubscriber) await stopSubscriber();
    await redis.quit();
    await sql.end();
    fastify.log.info('Connections closed');
  });

  await fastify.listen({ host: config.host, port: config.port });

  if (config.websocket.enabled) {
    const server = new ConfigUpdateSocketServer(fastify.log);
    server.attach(fastify.server);
    wsServer = server;
    stopSubscriber = await startConfigUpdateSubscriber(
      config.redisUrl,
      fastify.log,
      (payload) => {
        server.broadcast(payload);
      },
    );
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
