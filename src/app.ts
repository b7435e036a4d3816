import express from 'express';
import cors, { type CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import type { AppDeps } from './types/request.types';
import { ResponseHandler } from './utils/response';

const DEFAULT_DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without origin (curl, mobile shells)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [...appConfig.corsOrigins];
    if (appConfig.nodeEnv === 'development') {
      DEFAULT_DEV_ORIGINS.forEach(devOrigin => {
        if (!allowedOrigins.includes(devOrigin)) {
          allowedOrigins.push(devOrigin);
        }
      });
    }

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'X-Cart-Id'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

export const createApp = (deps: AppDeps) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json());

  app.get('/health', async (req, res, next) => {
    try {
      const { connectionError } = await deps.pantry.listProducts();
      if (connectionError) {
        return ResponseHandler.error(res, 'Store unreachable', 503, { code: 'STORE_UNAVAILABLE' });
      }
      return ResponseHandler.success(res, { status: 'ok', store: appConfig.storeDriver });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', createRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
