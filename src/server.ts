import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { loadEnv } from './config/env';
import { Services, createServices } from './container';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import { requestContext } from './middleware/requestContext.middleware';
import { createAdvisorRoutes } from './models/advisor/advisor.routes';
import { createJobRoutes } from './models/jobs/jobs.routes';
import { createMatchingRoutes } from './models/matching/matching.routes';
import { configureLogger, logger } from './utils/logger';

const API_VERSION = '1.0.0';

export interface AppOptions {
  corsOrigin: string;
  maxUploadBytes: number;
  maxTopK: number;
}

function corsOrigin(setting: string): boolean | string[] {
  return setting === '*' ? true : setting.split(',').map(origin => origin.trim()).filter(Boolean);
}

export function createApp(services: Services, options: AppOptions) {
  const app = express();

  // Basic middleware
  app.use(cors({ origin: corsOrigin(options.corsOrigin), credentials: true }));
  app.use(express.json({ limit: options.maxUploadBytes }));
  app.use(requestContext);

  app.get('/', (req, res) => {
    res.json({
      message: 'CV Job Matching API',
      version: API_VERSION,
      endpoints: {
        health: '/health',
        upload_cv: '/upload-cv',
        upload_cv_and_match: '/upload-cv-and-match',
        match_jobs: '/match-jobs',
        add_job: '/add-job',
        add_jobs: '/add-jobs',
        add_sample_jobs: '/add-sample-jobs',
        jobs: '/jobs/:id',
        collection_stats: '/collection-stats',
        chat: '/chat'
      }
    });
  });

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use(createMatchingRoutes(services.extractor, services.matcher, options));
  app.use(createJobRoutes(services.ingestion, services.store, options.maxUploadBytes));
  app.use(createAdvisorRoutes(services.advisor));

  // Error handling
  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}

export async function startServer(): Promise<void> {
  const env = loadEnv();
  configureLogger(env);

  const services = createServices(env);
  await services.initialize();

  const app = createApp(services, {
    corsOrigin: env.CORS_ORIGIN,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    maxTopK: env.MATCH_MAX_TOP_K
  });

  const server = app.listen(env.PORT, () => {
    logger.info(`Server running on port ${env.PORT}`);
    logger.info(`Environment: ${env.NODE_ENV}`);
  });

  // Handle graceful shutdown
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close();
    services.shutdown().then(
      () => process.exit(0),
      error => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Start the server
if (require.main === module) {
  startServer().catch(error => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
}
