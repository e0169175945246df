import express, { Request, Response } from 'express';
import { AgentService } from '../application/services/AgentService';
import { LivenessMonitor } from '../application/services/LivenessMonitor';
import { handleError, heartbeatSchema, idParamSchema, parseBody, parseParams } from './validation';

/**
 * Create agent routes: registration, heartbeats and derived health.
 */
export function createAgentRoutes(agentService: AgentService, livenessMonitor: LivenessMonitor) {
  const router = express.Router();

  router.get('/agents', async (req: Request, res: Response) => {
    try {
      res.json(await agentService.list());
    } catch (err) {
      handleError(err, res);
    }
  });

  // Health of every agent; raises agent_down for newly stale agents
  router.get('/agents/health', async (req: Request, res: Response) => {
    try {
      res.json(await livenessMonitor.check());
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/agents/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      res.status(201).json(await agentService.register(id));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.get('/agents/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const agent = await agentService.get(id);
      res.json({ ...agent, health: await livenessMonitor.health(id) });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/agents/:id/heartbeat', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      res.json(await agentService.heartbeat(id, parseBody(heartbeatSchema, req.body)));
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
