import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createSynthesisRoutes } from './routes/synthesis.js';
import { getRequestMetrics, recordRequestMetric } from './lib/request-metrics.js';
import { parsePositiveInt } from './lib/http-body-guard.js';
import { FF_LLM_NARRATIVE, FF_LLM_THEME_TAGGING } from './lib/feature-flags.js';
import logger from './lib/logger.js';

const app = new Hono();
let shuttingDown = false;

const isProduction = process.env.NODE_ENV === 'production';
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map(o => o.trim())
  : isProduction
    ? [] // Block all CORS in production if not configured
    : ['http://localhost:5173', 'http://localhost:5174'];

if (isProduction && !process.env.ALLOWED_ORIGINS) {
  logger.error('ALLOWED_ORIGINS not set in production; all cross-origin requests will be blocked');
}

app.use('*', requestIdMiddleware);

app.use('*', async (c, next) => {
  const startedAt = Date.now();
  let status = 500;
  try {
    const bypass = c.req.path === '/health' || c.req.path === '/metrics';
    if (shuttingDown && !bypass) {
      status = 503;
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }

    await next();
    status = c.res.status;
  } finally {
    recordRequestMetric(status, Date.now() - startedAt);
  }
});

app.use('*', async (c, next) => {
  await next();
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('X-Frame-Options', 'DENY');
  c.header('Referrer-Policy', 'no-referrer');
  const forwardedProto = c.req.header('x-forwarded-proto')?.split(',')[0]?.trim().toLowerCase();
  const requestIsHttps = forwardedProto === 'https' || c.req.url.startsWith('https:');
  if (isProduction && requestIsHttps) {
    c.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
  }
});

app.use('*', cors({
  origin: allowedOrigins,
  credentials: true,
}));

function llmKeyPresent(): boolean {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  const provider = configured === 'zai' || configured === 'anthropic'
    ? configured
    : (process.env.ZAI_API_KEY ? 'zai' : 'anthropic');
  return provider === 'zai' ? Boolean(process.env.ZAI_API_KEY) : Boolean(process.env.ANTHROPIC_API_KEY);
}

app.get('/health', (c) => {
  c.header('Cache-Control', 'no-store');
  const llmInUse = FF_LLM_THEME_TAGGING || FF_LLM_NARRATIVE;
  const status = shuttingDown
    ? 'draining'
    : (llmInUse && !llmKeyPresent() ? 'degraded' : 'ok');
  return c.json({
    status,
    shutting_down: shuttingDown,
    llm_collaborators: llmInUse,
    timestamp: new Date().toISOString(),
  });
});

const startTime = Date.now();

app.get('/metrics', (c) => {
  c.header('Cache-Control', 'no-store');
  const metricsKey = process.env.METRICS_KEY;
  if (metricsKey) {
    if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
  } else if (isProduction) {
    return c.json({ error: 'Not found' }, 404);
  }

  const memUsage = process.memoryUsage();
  return c.json({
    uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    shutting_down: shuttingDown,
    http_runtime: getRequestMetrics(),
    memory: {
      rss_mb: Math.round(memUsage.rss / 1024 / 1024),
      heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
      heap_total_mb: Math.round(memUsage.heapTotal / 1024 / 1024),
    },
    node_version: process.version,
  });
});

app.route('/api/synthesis', createSynthesisRoutes());

app.notFound((c) => {
  return c.json({ error: 'Not found' }, 404);
});

app.onError((err, c) => {
  const requestId = c.get('requestId');
  logger.error({ err, requestId, path: c.req.path, method: c.req.method }, 'Unhandled error');
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
});

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Stop accepting new connections; in-flight runs finish first.
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

const port = parsePositiveInt(process.env.PORT, 3001);

export function startServer() {
  if (server) return server;

  logger.info({ port }, 'Synthesis server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
