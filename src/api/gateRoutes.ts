import express, { Request, Response } from 'express';
import { CommitGateService } from '../application/services/CommitGateService';
import { evaluateCommitSchema, handleError, parseBody } from './validation';

export function createGateRoutes(commitGateService: CommitGateService) {
  const router = express.Router();

  // Decide whether a proposed commit may land
  router.post('/gate/evaluate', async (req: Request, res: Response) => {
    try {
      const decision = await commitGateService.evaluate(parseBody(evaluateCommitSchema, req.body));
      res.json({
        allowed: decision.allowed,
        reason: decision.reason,
        taskId: decision.taskId,
        failOpen: decision.failOpen,
        error: decision.error?.toJSON(),
      });
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
