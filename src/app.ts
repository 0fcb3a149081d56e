import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { createGatewayRouter } from './routes/gateway.routes';
import { GatewayController } from './controllers/gateway.controller';
import { GatewayService } from './services/gateway.service';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { AppConfig } from './types/config.types';
import { logger, logRequest } from './utils/logger';

export const APP_TITLE = 'Queue File Check and Upload';

/**
 * Create and configure Express application
 */
export function createApp(config: AppConfig, gateway: GatewayService): Application {
  const app = express();

  // ============================================
  // Security Middleware
  // ============================================

  // Helmet: Sets various HTTP headers for security
  app.use(helmet());

  // CORS: same-origin form posts only, but keep preflights well-formed
  app.use(
    cors({
      origin: false,
      methods: ['GET', 'POST'],
    })
  );

  // ============================================
  // Body and Cookie Parsing Middleware
  // ============================================

  // Parse URL-encoded bodies (multipart is parsed per route)
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  app.use(cookieParser());

  // ============================================
  // Request Logging Middleware
  // ============================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    // Log when response finishes
    res.on('finish', () => {
      const duration = Date.now() - startTime;
      logRequest(req.method, req.path, res.statusCode, duration);
    });

    next();
  });

  // ============================================
  // Routes
  // ============================================

  const controller = new GatewayController(gateway, {
    title: APP_TITLE,
    cookieSecure: config.session.cookieSecure,
  });
  app.use('/', createGatewayRouter(controller, config.upload));

  // ============================================
  // Error Handling
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler(config.nodeEnv === 'development'));

  logger.info('Express application configured successfully');

  return app;
}
