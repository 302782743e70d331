import express from 'express';
import cors from 'cors';
import createSulidRoutes from './routes/sulidRoutes';
import { SulidController } from './controllers/sulidController';
import config from './config/config';
import logger from './utils/logger';

export const createApp = (sulidController: SulidController = new SulidController()): express.Express => {
  // Create Express application
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(cors());

  // Logging middleware
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.url}`);
    next();
  });

  // Routes
  app.use('/api', createSulidRoutes(sulidController));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Documentation endpoint
  app.get('/', (req, res) => {
    res.status(200).json({
      name: 'SULID Service API',
      version: '1.0.0',
      description: 'Generate and inspect SULIDs: 128-bit, lexicographically sortable identifiers carrying a timestamp, random bits and a worker identity',
      maxBatchSize: config.maxBatchSize,
      endpoints: [
        {
          path: '/api/sulids',
          method: 'GET',
          description: 'Generate SULIDs with the configured generator',
          parameters: {
            count: `(Optional) How many SULIDs to generate, 1-${config.maxBatchSize} (default 1)`
          }
        },
        {
          path: '/api/sulids/:id',
          method: 'GET',
          description: 'Decode a SULID into timestamp, random and worker identity fields'
        },
        {
          path: '/api/sulids/:id/next',
          method: 'GET',
          description: 'Get the SULID whose random component is one greater, keeping timestamp and identity'
        },
        {
          path: '/api/generator',
          method: 'GET',
          description: 'Get the version and identity of the configured generator'
        },
        {
          path: '/health',
          method: 'GET',
          description: 'Health check endpoint'
        }
      ]
    });
  });

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { error: err });
    res.status(500).json({
      error: 'An unexpected error occurred',
      message: err.message
    });
  });

  return app;
};
