import dotenv from 'dotenv';
import path from 'path';

// Register module aliases for runtime path resolution
import moduleAlias from 'module-alias';
moduleAlias.addAliases({
  '@': path.join(__dirname, '.')
});

// Load environment variables FIRST, before any other imports
// Try multiple common .env locations (later loads override earlier)
const envCandidates = [
  path.join(process.cwd(), '.env'),
  path.join(__dirname, '../.env')
];
for (const p of envCandidates) {
  dotenv.config({ path: p, override: true });
}

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import { logger, accessLogStream, requestLogger, errorLogger } from '@/utils/logger';
import { config } from '@/utils/config';
import { AppError } from '@/utils/errors';
import { ErrorResponse } from '@/types/data';
import dashboardRoutes from '@/routes/dashboard';
import { getAnalyticsService } from '@/services/analyticsService';

const app = express();

// Security middleware
app.use(helmet());

app.use(cors({
  origin: true,
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Requested-With', 'Cache-Control', 'Pragma', 'Expires'],
  exposedHeaders: ['x-data-source', 'x-row-count', 'x-last-updated']
}));

if (config.rateLimit.enabled) {
  app.use('/api/', rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    message: {
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests from this IP, please try again later.'
      }
    },
    standardHeaders: true,
    legacyHeaders: false,
  }));
}

// Compression middleware
app.use(compression());

// Body parsing middleware
app.use(express.json({ limit: '1mb' }));

// Logging middleware
app.use(morgan('combined', { stream: accessLogStream }));
app.use(requestLogger);

// Health check endpoint
app.get('/health', (_req, res) => {
  res.json({
    success: true,
    message: 'Order Pulse API is running',
    timestamp: new Date().toISOString(),
    environment: config.nodeEnv,
    version: process.env.npm_package_version || '1.0.0'
  });
});

// API routes
app.use('/api/v1/dashboard', dashboardRoutes);

// Root endpoint
app.get('/api/v1', (_req, res) => {
  res.json({
    success: true,
    message: 'Order Pulse API',
    version: '1.0.0',
    endpoints: {
      overview: '/api/v1/dashboard/overview',
      kpis: '/api/v1/dashboard/kpis',
      insights: '/api/v1/dashboard/insights',
      aggregate: '/api/v1/dashboard/aggregate',
      trend: '/api/v1/dashboard/trend',
      orderValues: '/api/v1/dashboard/order-values',
      filterOptions: '/api/v1/dashboard/filter-options',
      dataHealth: '/api/v1/dashboard/data-health',
      reload: '/api/v1/dashboard/reload'
    }
  });
});

// 404 handler
app.use('*', (req, res) => {
  const body: ErrorResponse = {
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.originalUrl} not found`
    }
  };
  res.status(404).json(body);
});

// Error handling middleware
app.use(errorLogger);

app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const status = error instanceof AppError ? error.status : 500;
  const body: ErrorResponse = {
    success: false,
    error: {
      code: error instanceof AppError ? error.code : 'INTERNAL_SERVER_ERROR',
      message: error instanceof Error ? error.message : 'An unexpected error occurred',
      ...(config.nodeEnv === 'development' && error instanceof Error && { details: error.stack })
    }
  };
  res.status(status).json(body);
});

// Graceful shutdown
const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully`);
  process.exit(0);
};
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
const startServer = async () => {
  try {
    // Warm the dataset snapshot (non-fatal)
    try {
      const table = await getAnalyticsService().reload();
      logger.info(`Dataset loaded: ${table.rows.length} rows from ${table.source}`);
    } catch (e) {
      logger.warn('Unable to load dataset at start-up. Endpoints will retry on first request.', e);
    }

    app.listen(config.port, () => {
      logger.info(`Order Pulse API server running on port ${config.port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
      logger.info(`Health check: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();

export default app;
