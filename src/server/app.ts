import express from 'express';
import apiRoutes from './routes';
import { errorHandler } from './middleware/error.middleware';

export const createApp = () => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use('/api', apiRoutes);
  app.use(errorHandler);
  return app;
};
