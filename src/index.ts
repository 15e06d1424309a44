import fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfigFromEnv } from './config/config.js';
import { OrderedIndexService } from './services/ordered-index-service.js';
import { registerRoutes } from './api/routes.js';

const config = loadConfigFromEnv();

const server = fastify({
  logger: {
    level: config.logLevel,
    transport: config.prettyLogs ? { target: 'pino-pretty' } : undefined
  }
});

const indexService = new OrderedIndexService(server.log);

indexService.on('removed', change => {
  if (change.size === 0) {
    server.log.info('Index is now empty');
  }
});

async function start(): Promise<void> {
  try {
    server.log.info('Starting ordered-index service...');

    await server.register(cors, {
      origin: config.corsOrigins,
      credentials: true
    });
    server.log.info('CORS registered');

    // Limits are declared per route on the mutating endpoints
    await server.register(rateLimit, {
      global: false,
      max: config.rateLimitMax,
      timeWindow: '1 second'
    });
    server.log.info('Rate limiting registered');

    await server.register(swagger, {
      openapi: {
        openapi: '3.0.0',
        info: {
          title: 'Ordered Index API',
          description: 'Red-black tree backed ordered index of distinct numbers',
          version: '1.0.0',
          license: {
            name: 'MIT',
            url: 'https://opensource.org/licenses/MIT'
          }
        },
        servers: [
          {
            url: `http://localhost:${config.port}`,
            description: 'Development server'
          }
        ],
        tags: [
          { name: 'Index', description: 'Insert, remove, search and inspect the index' },
          { name: 'System', description: 'System health' }
        ]
      }
    });
    server.log.info('Swagger registered');

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: false
      },
      staticCSP: true
    });
    server.log.info('Swagger UI registered');

    registerRoutes(server, indexService, { rateLimitMax: config.rateLimitMax });
    server.log.info('Routes registered');

    await server.listen({ port: config.port, host: config.host });

    server.log.info(`Ordered index running on ${config.host}:${config.port}`);
    server.log.info(`REST API: http://${config.host}:${config.port}/api`);
    server.log.info(`API Documentation: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    server.log.error(err, 'Failed to start server');
    process.exit(1);
  }
}

async function shutdown(): Promise<void> {
  server.log.info('Shutting down gracefully...');
  await server.close();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

void start();
