/**
 * Server Entry Point
 * Loads settings, wires dependencies, starts Express and the job scheduler
 */

import { createServer } from 'http';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadSettings } from './config/env';
import { RedisConnection } from './lib/redis/redis.connection';
import { RateLimitManager } from './lib/rate-limit/rate-limit.manager';
import {
  JobScheduler,
  createRateLimitPurgeTask,
  createSystemHealthTask,
  createSystemMetricsTask,
} from './lib/jobs';
import { HealthService } from './modules/health/health.service';

const startServer = async (): Promise<void> => {
  dotenv.config();

  const loaded = loadSettings();
  if (!loaded.ok) {
    console.error('❌ Invalid configuration:');
    for (const error of loaded.errors) {
      console.error(`   - ${error}`);
    }
    process.exit(1);
  }
  const settings = loaded.value;

  console.log('🌱 Plant Care Application starting up...');

  const limiter = new RateLimitManager({
    maxCalls: settings.RATE_LIMIT_CALLS,
    windowSeconds: settings.RATE_LIMIT_PERIOD,
    exemptPaths: new Set(settings.RATE_LIMIT_EXEMPT_PATHS),
    maxClients: settings.RATE_LIMIT_MAX_CLIENTS,
  });

  // Initialize Redis connection
  console.log('📦 Initializing Redis connection...');
  const redisConnection = new RedisConnection({
    url: settings.REDIS_URL,
    connectTimeoutMs: settings.REDIS_CONNECTION_TIMEOUT * 1000,
  });
  const redisResult = await redisConnection.initialize();
  if (redisResult.ok) {
    console.log('✅ Redis connected and ready');
  } else {
    console.log(`⚠️  Redis unavailable (${redisResult.error}), health checks will report it as unhealthy`);
  }

  const healthService = new HealthService({ redis: redisConnection, limiter });

  // Background jobs
  const scheduler = new JobScheduler();
  scheduler.register(
    createSystemHealthTask(healthService, settings.ENVIRONMENT, settings.HEALTH_CHECK_INTERVAL * 1000)
  );
  if (settings.RATE_LIMIT_ENABLED) {
    scheduler.register(createRateLimitPurgeTask(limiter, settings.RATE_LIMIT_PURGE_INTERVAL * 1000));
  }
  scheduler.register(createSystemMetricsTask(limiter, scheduler, settings.METRICS_COLLECTION_INTERVAL * 1000));
  scheduler.start();

  const app = createApp({ settings, limiter, healthService });
  const httpServer = createServer(app);

  httpServer.listen(settings.APP_PORT, settings.APP_HOST, () => {
    const redisStatus = redisConnection.isAvailable() ? '✅ Connected' : '⚠️  Unavailable';
    const rateLimit = settings.RATE_LIMIT_ENABLED
      ? `${settings.RATE_LIMIT_CALLS} requests / ${settings.RATE_LIMIT_PERIOD}s per client`
      : 'disabled';

    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log(`🚀 Plant Care API is running`);
    console.log(`🚀 Environment: ${settings.ENVIRONMENT}`);
    console.log(`🚀 Address: ${settings.APP_HOST}:${settings.APP_PORT}`);
    console.log(`🚀 Redis: ${redisStatus}`);
    console.log(`🚀 Rate limit: ${rateLimit}`);
    console.log(`🚀 Health: http://localhost:${settings.APP_PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    scheduler.stop();
    httpServer.close(() => {
      console.log('HTTP server closed');
      redisConnection
        .disconnect()
        .then(() => {
          console.log('✅ Plant Care Application shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Redis disconnect failed:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
