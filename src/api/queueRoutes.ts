import express, { Request, Response } from 'express';
import { QueueService } from '../application/services/QueueService';
import {
  bulkEnqueueSchema,
  claimSchema,
  completeSchema,
  deploymentFailureSchema,
  enqueueSchema,
  failSchema,
  handleError,
  idParamSchema,
  parseBody,
  parseParams,
  parseQuery,
  pauseSchema,
  recoverSchema,
  replayQuerySchema,
  stageAndIdParamSchema,
  stageParamSchema,
  transitionsQuerySchema,
} from './validation';

interface QueueRouteDependencies {
  queueService: QueueService;
  inflightMaxAgeMs: number;
}

/**
 * Create queue routes for the stage pipeline.
 */
export function createQueueRoutes(deps: QueueRouteDependencies) {
  const { queueService, inflightMaxAgeMs } = deps;
  const router = express.Router();

  // Depth of every stage
  router.get('/queues', async (req: Request, res: Response) => {
    try {
      res.json(await queueService.stats());
    } catch (err) {
      handleError(err, res);
    }
  });

  router.get('/queues/dead-letter', async (req: Request, res: Response) => {
    try {
      res.json({ taskIds: await queueService.deadLetter() });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Put a dead-lettered task back into a stage
  router.post('/queues/dead-letter/:id/replay', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const { stage } = parseQuery(replayQuerySchema, req.query);
      res.json(await queueService.replayDeadLetter(id, stage ?? queueService.pipelineStages[0]));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/deployment-failure', async (req: Request, res: Response) => {
    try {
      const { taskId, error } = parseBody(deploymentFailureSchema, req.body);
      await queueService.reportDeploymentFailure(taskId, error);
      res.status(202).json({ success: true });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Pending and inflight contents of a stage
  router.get('/queues/:stage', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      res.json({ stage, ...(await queueService.list(stage)) });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/enqueue', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      const { taskId } = parseBody(enqueueSchema, req.body);
      const result = await queueService.enqueue(taskId, stage);
      res.status(result.kind === 'enqueued' ? 201 : 200).json(result);
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/bulk-enqueue', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      const { taskIds } = parseBody(bulkEnqueueSchema, req.body);
      res.json({ results: await queueService.bulkEnqueue(taskIds, stage) });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Claim the head of a stage, waiting up to timeoutMs
  router.post('/queues/:stage/claim', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      const { agentId, timeoutMs } = parseBody(claimSchema, req.body);
      res.json(await queueService.claim(stage, { agentId, timeoutMs: timeoutMs ?? 0 }));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/tasks/:id/complete', async (req: Request, res: Response) => {
    try {
      const { stage, id } = parseParams(stageAndIdParamSchema, req.params);
      const { commitSha } = parseBody(completeSchema, req.body);
      res.json(await queueService.complete(id, stage, { commitSha }));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/tasks/:id/fail', async (req: Request, res: Response) => {
    try {
      const { stage, id } = parseParams(stageAndIdParamSchema, req.params);
      const { reason } = parseBody(failSchema, req.body);
      res.json(await queueService.fail(id, stage, reason));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Requeue inflight entries older than maxAgeMs
  router.post('/queues/:stage/recover', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      const { maxAgeMs } = parseBody(recoverSchema, req.body);
      res.json({ recovered: await queueService.recoverStuck(stage, maxAgeMs ?? inflightMaxAgeMs) });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/pause', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      const { reason } = parseBody(pauseSchema, req.body);
      await queueService.pauseStage(stage, reason);
      res.json({ stage, paused: true });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/queues/:stage/resume', async (req: Request, res: Response) => {
    try {
      const { stage } = parseParams(stageParamSchema, req.params);
      await queueService.resumeStage(stage);
      res.json({ stage, paused: false });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Pipeline transition log, optionally for one task
  router.get('/transitions', async (req: Request, res: Response) => {
    try {
      const { taskId } = parseQuery(transitionsQuerySchema, req.query);
      res.json(await queueService.transitions(taskId));
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
