import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config.js';
import { FactorTableEmissionsProvider } from './collaborators/EmissionsProvider.js';
import { InMemoryCatalog } from './collaborators/InMemoryCatalog.js';
import { SimulatedPaymentGateway, type PaymentGateway } from './collaborators/PaymentGateway.js';
import { createCatalogToolServer } from './collaborators/catalogToolServer.js';
import { createEmissionsToolServer } from './collaborators/emissionsToolServer.js';
import { CartHandler } from './handlers/CartHandler.js';
import { CheckoutHandler } from './handlers/CheckoutHandler.js';
import { ComparisonHandler } from './handlers/ComparisonHandler.js';
import { DiscoveryHandler } from './handlers/DiscoveryHandler.js';
import { FootprintHandler } from './handlers/FootprintHandler.js';
import { GeneralHandler } from './handlers/GeneralHandler.js';
import { CapabilityRegistry } from './registry/CapabilityRegistry.js';
import { IntentClassifier } from './router/IntentClassifier.js';
import { MessageRouter } from './router/MessageRouter.js';
import { agentRoutes } from './routes/agentRoutes.js';
import { chatRoutes } from './routes/chat.js';
import { systemRoutes } from './routes/systemRoutes.js';
import type { ISessionStore } from './session/ISessionStore.js';
import { SessionService } from './session/SessionService.js';
import { openSessionStore } from './session/sessionStoreFactory.js';
import { HttpConnection } from './transport/HttpConnection.js';
import { InProcessConnection } from './transport/ToolConnection.js';
import type { ToolServer } from './transport/ToolServer.js';
import { ToolTransportClient } from './transport/ToolTransportClient.js';
import { toolRoutes } from './transport/toolRoutes.js';

export interface ServiceOverrides {
  payments?: PaymentGateway;
}

export interface Services {
  router: MessageRouter;
  registry: CapabilityRegistry;
  sessions: SessionService;
  transport: ToolTransportClient;
  /** Tool servers running in this process, by endpoint id. */
  toolServers: Map<string, ToolServer>;
}

/**
 * Wire collaborators, tool endpoints, handlers and the router together.
 *
 * Endpoints listed in REMOTE_TOOL_ENDPOINTS are reached over HTTP; the
 * built-in catalog and emissions endpoints run in process otherwise.
 */
export async function createServices(store: ISessionStore, overrides: ServiceOverrides = {}): Promise<Services> {
  const catalog = InMemoryCatalog.fromDataFile();
  const emissions = FactorTableEmissionsProvider.fromDataFile();
  const callTimeoutMs = config.timeouts.toolCallMs;

  const transport = new ToolTransportClient({ requestTimeoutMs: callTimeoutMs });
  const toolServers = new Map<string, ToolServer>();

  for (const server of [
    createCatalogToolServer(catalog, { callTimeoutMs }),
    createEmissionsToolServer(emissions, { callTimeoutMs }),
  ]) {
    if (!config.tools.remoteEndpoints[server.name]) {
      toolServers.set(server.name, server);
      transport.addEndpoint(server.name, new InProcessConnection(server));
    }
  }
  for (const [endpointId, url] of Object.entries(config.tools.remoteEndpoints)) {
    transport.addEndpoint(endpointId, new HttpConnection({ endpointId, url }));
  }

  const sessions = new SessionService({ store, ttlSeconds: config.session.ttlSeconds });
  const registry = new CapabilityRegistry({
    heartbeatIntervalMs: config.registry.heartbeatIntervalMs,
    stalenessMs: config.registry.stalenessMs,
  });
  const router = new MessageRouter({
    registry,
    sessions,
    classifier: new IntentClassifier({ categories: await catalog.categories() }),
    handlerTimeoutMs: config.router.handlerTimeoutMs,
    requestDeadlineMs: config.router.requestDeadlineMs,
    maxWorkflowDepth: config.router.maxWorkflowDepth,
    retry: config.retry,
    debug: config.debug,
  });

  const payments = overrides.payments ?? new SimulatedPaymentGateway();
  for (const handler of [
    new DiscoveryHandler(transport),
    new FootprintHandler(transport, sessions),
    new CartHandler(transport, sessions),
    new CheckoutHandler(transport, sessions, payments),
    new ComparisonHandler(transport),
    new GeneralHandler(transport),
  ]) {
    router.register(handler, handler.hooks());
  }

  return { router, registry, sessions, transport, toolServers };
}

export interface BuildServerOptions extends ServiceOverrides {
  /** Start the heartbeat loop. Tests turn it off and drive the registry themselves. */
  startRegistry?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: {
      level: config.debug ? 'debug' : 'info',
    },
    bodyLimit: config.limits.bodyLimitBytes,
  });

  // Must be registered before the routes so preflight OPTIONS requests are answered
  await fastify.register(cors, {
    origin: (origin, callback) => {
      // No origin: curl or server-to-server
      if (!origin) {
        callback(null, true);
        return;
      }
      if (config.cors.origins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  });

  const sessionStore = await openSessionStore(config.session);
  fastify.log.info(`Session store initialized: ${sessionStore.kind}`);

  const services = await createServices(sessionStore.store, options);

  if (options.startRegistry ?? true) {
    services.registry.start();
  }

  fastify.addHook('onClose', async () => {
    services.registry.stop();
    await sessionStore.close();
    fastify.log.info('Session store closed');
  });

  await fastify.register(toolRoutes, { servers: services.toolServers });
  await fastify.register(chatRoutes, { router: services.router });
  await fastify.register(agentRoutes, { router: services.router, registry: services.registry });
  await fastify.register(systemRoutes, {
    registry: services.registry,
    sessions: services.sessions,
    transport: services.transport,
  });

  return fastify;
}

export async function startServer() {
  const fastify = await buildServer();

  try {
    await fastify.listen({
      port: config.port,
      host: '0.0.0.0',
    });
    fastify.log.info(`Server listening on port ${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
