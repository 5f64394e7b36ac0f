import express from 'express';
import cors from 'cors';

/**
 * Create an Express app with the standard middleware stack.
 * Routes and the error handler are added by each handler module.
 */
export function createBaseApp(): express.Application {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());
  return app;
}
