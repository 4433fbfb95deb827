import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { AppContainer } from './container';
import { buildSwaggerSpec } from './swagger/swagger.config';
import { corsOrigins } from './config/environment';
import { logger } from './config/logger';

const SWAGGER_UI_HTML = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Label Queue API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@5.11.0/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;

/**
 * Creates and configures the Express application
 */
export function createApp(container: AppContainer): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for Swagger UI
  }));

  // CORS middleware
  app.use(cors({ origin: corsOrigins() }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI
  app.get('/docs', (_req, res) => {
    res.send(SWAGGER_UI_HTML);
  });

  // Built on first request from the lease duration this container resolved
  let swaggerSpec: object | null = null;
  app.get('/openapi.json', (_req, res) => {
    if (!swaggerSpec) {
      swaggerSpec = buildSwaggerSpec(container.leaseManager.leaseDurationMs / 1000);
    }
    res.json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', createRoutes(container));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured');

  return app;
}
