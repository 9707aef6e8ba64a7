import { Router, Request, Response } from 'express';
import { PostStore } from '../models/postModel';
import { createPostRouter } from './posts';

export const createRouter = (store: PostStore): Router => {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  router.use(createPostRouter(store));

  return router;
};
