import express, { Request, Response } from 'express';
import { TaskService } from '../application/services/TaskService';
import { QueueService } from '../application/services/QueueService';
import {
  createTaskSchema,
  deprecateTaskSchema,
  handleError,
  idParamSchema,
  importTasksSchema,
  parseBody,
  parseParams,
  parseQuery,
  taskQuerySchema,
  transitionTaskSchema,
  verifyTaskSchema,
} from './validation';

/**
 * Create task routes using the TaskService.
 */
export function createTaskRoutes(taskService: TaskService, queueService: QueueService) {
  const router = express.Router();

  // List tasks
  router.get('/tasks', async (req: Request, res: Response) => {
    try {
      const filter = parseQuery(taskQuerySchema, req.query);
      const tasks = await taskService.listTasks(filter);
      res.json(tasks);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Create task
  router.post('/tasks', async (req: Request, res: Response) => {
    try {
      const task = await taskService.createTask(parseBody(createTaskSchema, req.body));
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Import legacy tasks, mapping each to a stable id
  router.post('/tasks/import', async (req: Request, res: Response) => {
    try {
      const { tasks } = parseBody(importTasksSchema, req.body);
      const imported = await taskService.importLegacy(tasks);
      res.status(201).json({ imported: imported.length, tasks: imported });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Get task by display id or stable id
  router.get('/tasks/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      res.json(await taskService.getTask(id));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Where the task currently sits in the pipeline
  router.get('/tasks/:id/location', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const task = await taskService.getTask(id);
      res.json({ taskId: task.id, location: await queueService.locate(task.id) });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Move the task along one state-machine edge
  router.post('/tasks/:id/transition', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const { status, ...ctx } = parseBody(transitionTaskSchema, req.body);
      res.json(await taskService.transition(id, status, ctx));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Retire a task in favour of another
  router.post('/tasks/:id/deprecate', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const { supersededBy } = parseBody(deprecateTaskSchema, req.body);
      res.json(await taskService.deprecate(id, supersededBy));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Dry-run the completion gate
  router.post('/tasks/:id/verify', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const { commitSha } = parseBody(verifyTaskSchema, req.body);
      const failures = await taskService.verifyCompletion(id, commitSha);
      res.json({ taskId: id, passed: failures.length === 0, failures });
    } catch (err) {
      handleError(err, res);
    }
  });

  // Task history from the transition log
  router.get('/tasks/:id/transitions', async (req: Request, res: Response) => {
    try {
      const { id } = parseParams(idParamSchema, req.params);
      const task = await taskService.getTask(id);
      res.json(await queueService.transitions(task.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
