import express, { Request, Response } from 'express';
import { NotificationService } from '../application/services/NotificationService';
import { handleError, parseBody, publishNotificationSchema } from './validation';

/**
 * Create notification routes. Anything may publish; delivery is the notifier's job.
 */
export function createNotificationRoutes(notificationService: NotificationService) {
  const router = express.Router();

  router.get('/notifications', async (req: Request, res: Response) => {
    try {
      res.json(await notificationService.pending());
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/notifications', async (req: Request, res: Response) => {
    try {
      const notification = await notificationService.publishRaw(parseBody(publishNotificationSchema, req.body));
      res.status(202).json(notification);
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
