import express from 'express';
import { apiError } from './models/shared.js';
import { emiRoutes } from './routes/emi.js';
import { calculatorPageRoutes } from './routes/calculator-page.js';
import { errorHandler } from './middleware/error-handler.js';

export const SERVICE_NAME = 'EMI Calculator';
export const SERVICE_VERSION = '1.0.0';

export function createApp(): express.Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'operational', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.use('/api/emi', emiRoutes());

  app.use('/api', (_req, res) => {
    res.status(404).json(apiError('Not found'));
  });

  app.use('/', calculatorPageRoutes());

  app.use(errorHandler);

  return app;
}
