import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import dotenv from 'dotenv';
import { Database } from 'sqlite';
import { createRoutes } from './routes';
import { AppConfig, loadConfig } from './config';
import { closeDatabase, initializeDatabase } from './config/database';
import { closeRedisClient } from './config/redis';
import { ClassificationEventSubscriber } from './services/events/ClassificationEventSubscriber';
import { SERVICE_NAME } from './controllers/HealthController';

/**
 * Build the Express application around an initialized database
 */
export function createApp(config: AppConfig, db: Database): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: config.frontendUrl || ['http://localhost:3000', 'http://localhost:5173'],
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRoutes(config, db));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: {
        health: 'GET /health',
        classifications: 'POST|GET /classifications',
        tasks: 'POST|GET /tasks',
        briefs: 'POST|GET /briefs'
      }
    });
  });

  // Error handler
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const config = loadConfig();

    console.log('📊 Setting up database...');
    const db = await initializeDatabase(config.databasePath);

    const app = createApp(config, db);

    const subscriber = config.events.consumerEnabled
      ? new ClassificationEventSubscriber({ channel: config.events.channel, redisUrl: config.redisUrl })
      : null;
    if (subscriber) {
      try {
        await subscriber.start();
      } catch (error) {
        console.error('Failed to start classification event consumer:', error);
      }
    }

    const server = app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
      console.log(`📨 ${SERVICE_NAME}`);
      console.log(`🏥 Health check: http://localhost:${config.port}/health`);
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down...`);
      server.close(() => {
        Promise.all([subscriber?.stop(), closeRedisClient(), closeDatabase()])
          .then(() => process.exit(0))
          .catch(error => {
            console.error('❌ Error during shutdown:', error);
            process.exit(1);
          });
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

if (require.main === module) {
  // Load environment variables
  dotenv.config();
  startServer().catch(error => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  });
}
