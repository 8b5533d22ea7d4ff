import express, { Application, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import { createRoutes } from './routes';
import { createDefaultServices, type AppServices } from './services';

// The sync route reads its own body (multipart or raw bytes of any type)
const SYNC_UPLOAD_PATH = `${env.API_PREFIX}/reconciliation/sync-excel`.toLowerCase();

const isSyncUpload = (path: string): boolean => path.replace(/\/+$/, '').toLowerCase() === SYNC_UPLOAD_PATH;

const exceptSyncUpload =
  (parser: RequestHandler): RequestHandler =>
  (req, res, next) =>
    isSyncUpload(req.path) ? next() : parser(req, res, next);

/**
 * Create and configure Express application
 *
 * @param services - Service graph; production wiring when omitted
 */
export const createApp = (services: AppServices = createDefaultServices()): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(hpp());

  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like curl or server-to-server)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;
        callback(null, allowedOrigins.includes('*') || allowedOrigins.includes(origin));
      },
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
    })
  );

  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      message: {
        success: false,
        error: 'Too many requests, please try again later',
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // Body parsing middleware (uploads are parsed per route)
  app.use(exceptSyncUpload(express.json({ limit: '10mb' })));
  app.use(exceptSyncUpload(express.urlencoded({ extended: true, limit: '10mb' })));

  app.use(compression());

  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, createRoutes(services));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Invoice Reconciliation API',
      version: '1.0.0',
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
