/**
 * Application Integration Tests
 * Full middleware chain and routes served by createApp
 */

import { Application } from 'express';
import { createApp } from '../../app';
import { Settings } from '../../config/env';
import { RateLimitManager } from '../../lib/rate-limit/rate-limit.manager';
import { HealthService } from '../../modules/health/health.service';
import { createTestSettings } from '../helpers/fixtures';
import { sendRequest } from '../helpers/http';
import { createMockHealthProbe, silenceConsole } from '../helpers/mocks';

const CLIENT = { 'X-Forwarded-For': '192.0.2.10' };

describe('Plant Care API', () => {
  let limiter: RateLimitManager;

  silenceConsole();

  function buildApp(overrides: Partial<Settings> = {}, redisHealthy: boolean = true): Application {
    limiter = new RateLimitManager({ maxCalls: 2, windowSeconds: 60 });
    const healthService = new HealthService({ redis: createMockHealthProbe(redisHealthy), limiter });
    return createApp({
      settings: createTestSettings(overrides),
      limiter,
      healthService,
      rateLimitOptions: { clock: () => 1000 },
    });
  }

  describe('GET /', () => {
    it('should describe the API', async () => {
      const response = await sendRequest(buildApp(), '/', { headers: CLIENT });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: '🌱 Welcome to Plant Care API',
        version: '1.0.0',
        docs: '/docs',
        health: '/health',
      });
    });

    it('should pass through the whole middleware chain', async () => {
      const response = await sendRequest(buildApp(), '/', { headers: CLIENT });

      expect(response.headers.get('x-request-id')).toBeTruthy();
      expect(response.headers.get('x-frame-options')).toBe('DENY');
      expect(response.headers.get('x-ratelimit-limit')).toBe('2');
      expect(response.headers.get('x-ratelimit-remaining')).toBe('1');
      expect(response.headers.get('x-ratelimit-reset')).toBe('1060');
      expect(response.headers.get('x-powered-by')).toBeNull();
    });

    it('should echo the origin for CORS in debug mode', async () => {
      const response = await sendRequest(buildApp(), '/', {
        headers: { ...CLIENT, Origin: 'http://localhost:5173' },
      });

      expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
      expect(response.headers.get('access-control-allow-credentials')).toBe('true');
    });
  });

  describe('health endpoints', () => {
    it('should answer GET /health', async () => {
      const response = await sendRequest(buildApp(), '/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'healthy', service: 'plant-care-api', version: '1.0.0' });
      expect(response.headers.get('x-ratelimit-limit')).toBeNull();
    });

    it('should include dependencies in GET /health/detailed', async () => {
      const response = await sendRequest(buildApp(), '/health/detailed');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        dependencies: { redis: 'healthy' },
        rateLimiter: { totalChecks: 0, activeClients: 0 },
      });
    });

    it('should answer 503 when Redis is unhealthy', async () => {
      const response = await sendRequest(buildApp({}, false), '/health/detailed');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'unhealthy', dependencies: { redis: 'unhealthy' } });
    });
  });

  describe('API v1', () => {
    it('should list the planned endpoint groups', async () => {
      const response = await sendRequest(buildApp(), '/api/v1', { headers: CLIENT });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        message: '🌱 Plant Care API v1',
        api_version: 'v1',
        health: '/api/v1/health',
        endpoints: { plants: '/api/v1/plants', care: '/api/v1/care', admin: '/api/v1/admin' },
      });
    });

    it('should report API health', async () => {
      const response = await sendRequest(buildApp(), '/api/v1/health', { headers: CLIENT });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'healthy',
        version: '1.0.0',
        api_version: 'v1',
        dependencies: { redis: 'healthy' },
      });
    });

    it('should answer 503 from API health when Redis is down', async () => {
      const response = await sendRequest(buildApp({}, false), '/api/v1/health', { headers: CLIENT });

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'unhealthy' });
    });
  });

  describe('GET /api/v1/debug/routes', () => {
    it('should list the v1 routes in debug mode', async () => {
      const response = await sendRequest(buildApp(), '/api/v1/debug/routes', { headers: CLIENT });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        total_routes: 3,
        routes: [
          { path: '/api/v1', methods: ['GET'], name: 'api_v1_root', tags: ['Root'] },
          { path: '/api/v1/health', methods: ['GET'], name: 'api_health_check', tags: ['Health'] },
          { path: '/api/v1/debug/routes', methods: ['GET'], name: 'list_routes', tags: ['Development'] },
        ],
      });
    });

    it('should not exist outside debug mode', async () => {
      const response = await sendRequest(buildApp({ DEBUG: false }), '/api/v1/debug/routes', { headers: CLIENT });

      expect(response.status).toBe(404);
    });
  });

  describe('trusted hosts', () => {
    it('should reject unknown hosts when debug is off', async () => {
      const app = buildApp({ DEBUG: false, ALLOWED_HOSTS: ['api.example.com'] });

      const response = await sendRequest(app, '/health', { headers: CLIENT });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: {
          code: 'INVALID_HOST',
          message: 'Invalid host header',
          request_id: response.headers.get('x-request-id'),
        },
      });
    });

    it('should serve allowed hosts when debug is off', async () => {
      const app = buildApp({ DEBUG: false, ALLOWED_HOSTS: ['api.example.com'] });

      const response = await sendRequest(app, '/health', {
        headers: { ...CLIENT, 'X-Forwarded-Host': 'api.example.com' },
      });

      expect(response.status).toBe(200);
    });

    it('should not check hosts in debug mode', async () => {
      const app = buildApp({ ALLOWED_HOSTS: ['api.example.com'] });

      const response = await sendRequest(app, '/health', { headers: CLIENT });

      expect(response.status).toBe(200);
    });
  });

  describe('rate limiting', () => {
    it('should reject the third request in a window and keep health reachable', async () => {
      const app = buildApp();

      await sendRequest(app, '/api/v1', { headers: CLIENT });
      await sendRequest(app, '/api/v1', { headers: CLIENT });
      const rejected = await sendRequest(app, '/api/v1', { headers: CLIENT });
      const health = await sendRequest(app, '/health', { headers: CLIENT });

      expect(rejected.status).toBe(429);
      expect(rejected.headers.get('retry-after')).toBe('60');
      expect(rejected.body).toEqual({
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Rate limit exceeded: 2 requests per 60 seconds',
          retry_after: 60,
          request_id: rejected.headers.get('x-request-id'),
        },
      });
      expect(health.status).toBe(200);
    });

    it('should keep health exempt under case and trailing-slash variants', async () => {
      const app = buildApp();

      await sendRequest(app, '/api/v1', { headers: CLIENT });
      await sendRequest(app, '/api/v1', { headers: CLIENT });
      const variants = await Promise.all(
        ['/health/', '/HEALTH', '/Health/Detailed/'].map(path => sendRequest(app, path, { headers: CLIENT }))
      );

      expect(variants.map(response => response.status)).toEqual([200, 200, 200]);
      expect(variants[1].body).toEqual({ status: 'healthy', service: 'plant-care-api', version: '1.0.0' });
      expect(limiter.peek('192.0.2.10')).toMatchObject({ count: 2 });
    });

    it('should not limit when disabled', async () => {
      const app = buildApp({ RATE_LIMIT_ENABLED: false });

      for (let i = 0; i < 3; i++) {
        const response = await sendRequest(app, '/api/v1', { headers: CLIENT });
        expect(response.status).toBe(200);
        expect(response.headers.get('x-ratelimit-limit')).toBeNull();
      }
      expect(limiter.getStats().totalChecks).toBe(0);
    });
  });

  describe('unknown routes', () => {
    it('should answer 404 with ROUTE_NOT_FOUND', async () => {
      const response = await sendRequest(buildApp(), '/api/v1/plants', { headers: CLIENT });

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        error: { code: 'ROUTE_NOT_FOUND', message: 'Route not found: GET /api/v1/plants' },
      });
    });
  });
});
