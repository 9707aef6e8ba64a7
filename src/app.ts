import express, { Express } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { errorHandler, notFound, requestLogger } from './middleware';
import { PostStore } from './models/postModel';
import { createRouter } from './routes';

export type AppOptions = Pick<AppConfig, 'corsOrigins' | 'logRequests'>;

export const createApp = (store: PostStore, options: AppOptions): Express => {
  const app = express();

  if (options.logRequests) {
    app.use(requestLogger);
  }

  if (options.corsOrigins.length > 0) {
    app.use(cors({
      origin: options.corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }));
  }

  // Forms post urlencoded bodies, API clients may send JSON
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(createRouter(store));

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
