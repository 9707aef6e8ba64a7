import { Router } from 'express';
import { createPostController } from '../controllers/postController';
import { PostStore } from '../models/postModel';

export const createPostRouter = (store: PostStore): Router => {
  const router = Router();
  const posts = createPostController(store);

  router.get('/', posts.list);
  router.get('/add', posts.addForm);
  router.post('/add', posts.add);
  router.get('/update/:id(\\d+)', posts.updateForm);
  router.post('/update/:id(\\d+)', posts.update);
  router.post('/delete/:id(\\d+)', posts.remove);
  router.post('/like/:id(\\d+)', posts.like);

  return router;
};
