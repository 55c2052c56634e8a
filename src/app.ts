import express from 'express';
import cors, { CorsOptions } from 'cors';
import { Pool } from 'pg';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { attachStore } from './middlewares/database.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:3001',
  'http://localhost:5173',
];

const allowedOrigins = (): string[] => {
  const origins = new Set<string>(appConfig.corsOrigins);
  if (appConfig.frontendUrl) {
    origins.add(appConfig.frontendUrl);
  }
  if (appConfig.nodeEnv === 'development') {
    DEV_ORIGINS.forEach(origin => origins.add(origin));
  }
  return [...origins];
};

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (like curl requests)
    if (!origin) {
      return callback(null, true);
    }

    if (allowedOrigins().includes(origin)) {
      return callback(null, true);
    }

    // In development, allow all origins if CORS_ORIGINS is not set
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

/**
 * Build the HTTP application around a connection pool. Every /api request
 * gets its own client from the pool.
 */
export const createApp = (pool: Pool) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (req, res) => {
    try {
      await pool.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch {
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api', attachStore(pool), routes);

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
