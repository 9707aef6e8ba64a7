import { NextFunction, Request, Response } from 'express';
import { PostStore } from '../models/postModel';
import { PostChanges } from '../types';
import { renderAdd, renderIndex, renderUpdate } from '../views/posts';

const NOT_FOUND = 'Post not found';

// Form fields arrive as strings; anything else counts as not supplied
const field = (body: unknown, name: string): string | undefined => {
  if (typeof body !== 'object' || body === null || !(name in body)) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
};

const filled = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim().length > 0 ? value : undefined;

const postId = (req: Request): number => parseInt(req.params.id, 10);

export const createPostController = (store: PostStore) => ({
  list: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const posts = await store.load();
      res.send(renderIndex(posts));
    } catch (error) {
      next(error);
    }
  },

  addForm: (_req: Request, res: Response) => {
    res.send(renderAdd());
  },

  add: async (req: Request, res: Response, next: NextFunction) => {
    const title = filled(field(req.body, 'title'));
    const content = filled(field(req.body, 'content'));
    const author = filled(field(req.body, 'author'));

    if (!title || !content) {
      res.status(400).type('text/plain').send('Title and content are required');
      return;
    }

    try {
      await store.create({ title, content, author });
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  },

  updateForm: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const post = await store.fetchById(postId(req));
      if (!post) {
        res.status(404).type('text/plain').send(NOT_FOUND);
        return;
      }
      res.send(renderUpdate(post));
    } catch (error) {
      next(error);
    }
  },

  update: async (req: Request, res: Response, next: NextFunction) => {
    const changes: PostChanges = {
      title: field(req.body, 'title'),
      content: field(req.body, 'content'),
      author: filled(field(req.body, 'author')),
    };

    try {
      const post = await store.update(postId(req), changes);
      if (!post) {
        res.status(404).type('text/plain').send(NOT_FOUND);
        return;
      }
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  },

  remove: async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.delete(postId(req));
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  },

  like: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const post = await store.like(postId(req));
      if (!post) {
        res.status(404).type('text/plain').send(NOT_FOUND);
        return;
      }
      res.redirect('/');
    } catch (error) {
      next(error);
    }
  },
});
