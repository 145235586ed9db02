import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './swagger.js';
import { config } from './config.js';

// Routes
import taxRoutes from './routes/tax.js';
import calculatorRoutes from './routes/calculator.js';

// Middleware
import { generalLimiter } from './middleware/rateLimit.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { requestLogger } from './middleware/requestLogger.js';
import { getMetrics, getMetricsContentType } from './services/metrics.js';
import { logger } from './services/logger.js';

// API Version
export const API_VERSION = 'v1';

export function createApp(): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"], // Calculator page and Swagger UI
        scriptSrc: ["'self'", "'unsafe-inline'"], // For Swagger UI
        imgSrc: ["'self'", 'data:'],
      },
    },
    crossOriginEmbedderPolicy: false, // Allow Swagger UI to load
  }));
  app.use(compression());
  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  // JSON API only. The form reports such fields as Invalid Input
  app.use('/api', sanitizeInput);

  if (!config.DISABLE_RATE_LIMIT) {
    app.use('/api', generalLimiter);
  } else {
    logger.warn('Rate limiting is DISABLED. Unset DISABLE_RATE_LIMIT for production.');
  }

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  // Prometheus metrics endpoint
  app.get('/api/metrics', async (_req, res, next) => {
    try {
      const metrics = await getMetrics();
      res.set('Content-Type', getMetricsContentType());
      res.send(metrics);
    } catch (error) {
      next(error);
    }
  });

  // API Documentation
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Salaried Income Tax Calculator API'
  }));

  app.get('/api/docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Unversioned (backward compatible) and versioned
  app.use('/api/tax', taxRoutes);
  app.use(`/api/${API_VERSION}/tax`, taxRoutes);

  // Calculator form
  app.use('/', calculatorRoutes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
