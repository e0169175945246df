import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { WebSocketServer } from 'ws';
import { createContainer, Container, ContainerOverrides } from './container';
import { createTaskRoutes } from './api/taskRoutes';
import { createQueueRoutes } from './api/queueRoutes';
import { createAgentRoutes } from './api/agentRoutes';
import { createNotificationRoutes } from './api/notificationRoutes';
import { createGateRoutes } from './api/gateRoutes';
import { handleError } from './api/validation';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';

/**
 * Build the HTTP app on top of a wired container. No listening socket is opened.
 */
export function createApp(container: Container): Express {
  const { config, logger, store, taskService, queueService, agentService, livenessMonitor, notificationService, commitGateService } = container;

  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    }));
  }
  app.use(express.json());

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    const storeReachable = await store.ping().catch(() => false);
    res.status(storeReachable ? 200 : 503).json({
      status: storeReachable ? 'ok' : 'degraded',
      store: config.store.type,
      depth: config.pipeline.depth,
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  app.use('/api', createTaskRoutes(taskService, queueService));
  app.use('/api', createQueueRoutes({ queueService, inflightMaxAgeMs: config.pipeline.inflightMaxAgeMs }));
  app.use('/api', createAgentRoutes(agentService, livenessMonitor));
  app.use('/api', createNotificationRoutes(notificationService));
  app.use('/api', createGateRoutes(commitGateService));

  // Global error handling middleware (malformed JSON bodies end up here)
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.error('Server error', err);
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: true, code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
      return;
    }
    handleError(err, res);
  });

  return app;
}

/**
 * Start the HTTP API and the WebSocket event feed. Resolves once listening.
 */
export async function startServer(overrides: ContainerOverrides = {}): Promise<{ server: Server; container: Container; close(): Promise<void> }> {
  const container = await createContainer(overrides);
  await container.initialize();

  const { config, logger, eventBus } = container;
  const app = createApp(container);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, config.host, () => resolve(listening));
  });
  logger.info(`Coordinator listening on http://${config.host}:${config.port}`);

  // Start WebSocket server with event bus bridge
  const wss = new WebSocketServer({ server });
  new WebSocketBridge(wss, eventBus, logger);

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      wss.clients.forEach(client => client.close());
      await new Promise<void>(resolve => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
      await container.shutdown();
    })();
    return closing;
  };

  return { server, container, close };
}
