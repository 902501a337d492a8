import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type Database from 'better-sqlite3';
import { getStagegatePaths } from '../workspace/paths.js';
import { openDb } from '../workspace/db.js';
import { SqliteBuildStore } from '../store/sqlite-store.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { registerBuildRoutes } from './routes/builds.js';

export const LOOPBACK_ORIGINS = ['http://localhost', 'http://127.0.0.1', 'http://[::1]'];

export interface ServerOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Use this database instead of the workspace's state.db. */
  db?: Database.Database;
}

export interface CreatedServer {
  fastify: FastifyInstance;
  host: string;
  port: number;
}

export async function createServer(opts: ServerOptions = {}): Promise<CreatedServer> {
  const host = opts.host ?? process.env['STAGEGATE_API_HOST'] ?? '127.0.0.1';
  const port = opts.port ?? parseInt(process.env['STAGEGATE_API_PORT'] ?? '7800', 10);

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. Build records may contain sensitive findings.', { host });
  }

  const db = opts.db ?? openDb(getStagegatePaths(opts.cwd).stateDb);
  const store = new SqliteBuildStore(db);

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(cors, {
    origin: LOOPBACK_ORIGINS,
    methods: ['GET', 'OPTIONS'],
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'no-referrer');
  });

  fastify.get('/v1/health', async () => ({ status: 'ok', builds: store.count() }));
  await registerBuildRoutes(fastify, { store });

  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('Build history API listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: describeError(err).message });
    process.exit(1);
  }
}
