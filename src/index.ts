import 'dotenv/config';

import { pathToFileURL } from 'node:url';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loadConfig, type AppConfig } from './config.js';
import type { ICatalog } from './domain/catalog/Catalog.js';
import { CartService } from './domain/services/CartService.js';
import { CheckoutService } from './domain/services/CheckoutService.js';
import { StandardPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { DomainError } from './domain/errors/index.js';
import { ITEM_CATEGORIES, type AddItemRequest, type ItemCategory } from './domain/models.js';
import { loadCatalog } from './infrastructure/catalog/loadCatalog.js';
import { KeyedMutex } from './infrastructure/locks/KeyedMutex.js';
import { InMemoryCartRepository } from './infrastructure/repositories/InMemoryCartRepository.js';
import { InMemoryOrderRepository } from './infrastructure/repositories/InMemoryOrderRepository.js';
import { registerSession } from './http/session.js';
import type { OpenAPIV3 } from 'openapi-types';

export interface BuildAppOptions {
  config?: AppConfig;
  catalog?: ICatalog;
}

const priceLineSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  properties: {
    itemId: { type: 'string', example: 'pizza' },
    name: { type: 'string', example: 'Pizza' },
    image: { type: 'string', example: 'pizza.jpg' },
    unitPrice: { type: 'number', example: 5.0 },
    quantity: { type: 'integer', minimum: 1 },
    lineTotal: { type: 'number', example: 10.0 },
  },
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const catalog = options.catalog ?? loadCatalog(config.catalogPath);

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl ?? `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'menu', description: 'Browse the food menu' },
        { name: 'cart', description: 'Session cart operations' },
        { name: 'checkout', description: 'Checkout and order confirmation' },
      ],
      components: {
        schemas: {
          Item: {
            type: 'object',
            required: ['itemId', 'name', 'price', 'category', 'image'],
            properties: {
              itemId: { type: 'string', example: 'pizza' },
              name: { type: 'string', example: 'Pizza' },
              price: { type: 'number', example: 5.0 },
              category: { type: 'string', enum: [...ITEM_CATEGORIES], example: 'fun' },
              image: { type: 'string', example: 'pizza.jpg' },
              description: { type: 'string', example: 'Delicious cheese pizza' },
            },
          },
          CartLine: priceLineSchema,
          Cart: {
            type: 'object',
            properties: {
              sessionId: { type: 'string', format: 'uuid' },
              lines: { type: 'array', items: { $ref: '#/components/schemas/CartLine' } },
              itemCount: { type: 'integer' },
              total: { type: 'number' },
              createdAt: { type: 'string', format: 'date-time', nullable: true },
              updatedAt: { type: 'string', format: 'date-time', nullable: true },
            },
          },
          Order: {
            type: 'object',
            properties: {
              orderId: { type: 'string', format: 'uuid' },
              sessionId: { type: 'string', format: 'uuid' },
              lines: { type: 'array', items: { $ref: '#/components/schemas/CartLine' } },
              itemCount: { type: 'integer' },
              total: { type: 'number' },
              createdAt: { type: 'string', format: 'date-time' },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  await app.register(cookie, { secret: config.sessionSecret });
  registerSession(app, {
    cookieName: config.sessionCookieName,
    secure: config.nodeEnv === 'production',
    routePrefix: '/v1/',
  });

  // dependency injection
  const cartRepository = new InMemoryCartRepository({
    ttlMinutes: config.cartTtlMinutes,
    cleanupIntervalMs: config.cartCleanupIntervalSeconds * 1000,
    logger: app.log,
  });
  const orderRepository = new InMemoryOrderRepository();
  const pricingStrategy = new StandardPricingStrategy();
  const sessionLocks = new KeyedMutex();
  const cartService = new CartService(catalog, cartRepository, pricingStrategy, sessionLocks, {
    maxQuantity: config.maxQuantity,
    maxCartItems: config.maxCartItems,
  });
  const checkoutService = new CheckoutService(
    catalog,
    cartRepository,
    orderRepository,
    pricingStrategy,
    sessionLocks
  );

  app.addHook('onClose', async () => {
    cartRepository.destroy();
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  app.get('/api/info', {
    schema: {
      tags: ['health'],
      description: 'Application name, version and endpoint map',
    },
  }, async () => {
    return {
      appName: config.apiTitle,
      version: config.apiVersion,
      description: config.apiDescription,
      endpoints: {
        menu: '/v1/menu',
        cart: '/v1/cart',
        checkout: '/v1/checkout',
        orders: '/v1/orders/:orderId',
        health: '/health',
        docs: '/docs',
      },
    };
  });

  // === Menu Routes ===

  app.get<{
    Querystring: { category?: ItemCategory };
  }>('/v1/menu', {
    schema: {
      tags: ['menu'],
      description: 'List menu items, optionally for one category',
      querystring: {
        type: 'object',
        properties: {
          category: { type: 'string', enum: [...ITEM_CATEGORIES] },
        },
      },
    },
  }, async (request, reply) => {
    const { category } = request.query;
    const items = category ? catalog.listByCategory(category) : catalog.list();

    return reply.code(200).send({
      data: items,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { itemId: string };
  }>('/v1/menu/:itemId', {
    schema: {
      tags: ['menu'],
      description: 'Retrieve a single menu item',
      params: {
        type: 'object',
        required: ['itemId'],
        properties: {
          itemId: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request, reply) => {
    return reply.code(200).send({
      data: catalog.get(request.params.itemId),
      timestamp: new Date().toISOString(),
    });
  });

  // === Cart Routes ===

  app.get('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: "Retrieve the current session's cart",
    },
  }, async (request, reply) => {
    const cart = await cartService.getCart(request.sessionId);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // Add item
  app.post<{
    Body: AddItemRequest;
  }>('/v1/cart/items', {
    schema: {
      tags: ['cart'],
      description: 'Add an item to the cart (or merge quantity if already present)',
      body: {
        type: 'object',
        required: ['itemId'],
        properties: {
          itemId: { type: 'string', minLength: 1 },
          quantity: { type: 'integer', default: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { itemId, quantity } = request.body;
    const cart = await cartService.addItem(request.sessionId, itemId, quantity);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // Remove item
  app.delete<{
    Params: { itemId: string };
    Querystring: { quantity?: number };
  }>('/v1/cart/items/:itemId', {
    schema: {
      tags: ['cart'],
      description: 'Remove units of an item; the entry is dropped when none are left',
      params: {
        type: 'object',
        required: ['itemId'],
        properties: {
          itemId: { type: 'string', minLength: 1 },
        },
      },
      querystring: {
        type: 'object',
        properties: {
          quantity: { type: 'integer', default: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { itemId } = request.params;
    const cart = await cartService.removeItem(request.sessionId, itemId, request.query.quantity);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // Clear cart
  app.delete('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'Remove every item from the cart',
    },
  }, async (request, reply) => {
    const cart = await cartService.clearCart(request.sessionId);
    request.log.info('Cart cleared');

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // === Checkout Routes ===

  app.post('/v1/checkout', {
    schema: {
      tags: ['checkout'],
      description: 'Turn the cart into an order and empty the cart',
    },
  }, async (request, reply) => {
    const order = await checkoutService.checkout(request.sessionId);
    request.log.info(
      { orderId: order.orderId, itemCount: order.itemCount, total: order.total },
      'Checkout completed'
    );

    return reply.code(201).send({
      data: order,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { orderId: string };
  }>('/v1/orders/:orderId', {
    schema: {
      tags: ['checkout'],
      description: 'Retrieve an order placed by the current session',
      params: {
        type: 'object',
        required: ['orderId'],
        properties: {
          orderId: { type: 'string', format: 'uuid' },
        },
      },
    },
  }, async (request, reply) => {
    const order = await checkoutService.getOrder(request.sessionId, request.params.orderId);

    return reply.code(200).send({
      data: order,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      request.log.warn({ code: error.code }, error.message);
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify's own client errors: bad JSON, empty body, unsupported media type...
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ code: error.code }, error.message);
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    request.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.once(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => {
            app.log.info('Server closed successfully');
            process.exit(0);
          },
          (err: unknown) => {
            app.log.error(err, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
