import path from 'path';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import swaggerJSDoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';
import config from './config';
import authRoutes from './routes/auth';
import profileRoutes from './routes/profile';
import jobRoutes from './routes/jobs';
import applicationRoutes from './routes/applications';
import interviewRoutes from './routes/interviews';
import notificationRoutes from './routes/notifications';
import adminRoutes from './routes/admin';
import { UploadRejectedError } from './utils/uploads';

// Function to determine path based on environment
export function getEnvironmentPath(environment: string): string {
  switch (environment) {
    case 'development':
      return '/dev';
    case 'uat':
      return '/uat';
    case 'production':
      return '/prod';
    default:
      return '';
  }
}

export const createApp = () => {
  const app = express();
  const environmentPath = getEnvironmentPath(config.environment);
  const api = `${environmentPath}/api/v1`;

  // Set up CORS
  app.use(
    cors({
      origin: '*',
      methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
      allowedHeaders: 'Content-Type,Authorization',
    })
  );

  // Middleware for JSON parsing
  app.use(express.json());

  app.use(`${api}/auth`, authRoutes);
  app.use(`${api}/profile`, profileRoutes);
  app.use(`${api}/jobs`, jobRoutes);
  app.use(`${api}/applications`, applicationRoutes);
  app.use(`${api}/interviews`, interviewRoutes);
  app.use(`${api}/notifications`, notificationRoutes);
  app.use(`${api}/admin`, adminRoutes);

  // Swagger configuration
  const swaggerDocs = swaggerJSDoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: `${config.appName} API Documentation`,
        version: '1.0.0',
        description: 'API documentation for the campus placement system',
      },
      servers: [
        {
          url: `http://localhost:${config.port}${environmentPath}`,
        },
      ],
    },
    apis: [path.join(__dirname, 'routes', '*.{ts,js}')],
  });
  app.use(`${environmentPath}/api-docs`, swaggerUi.serve, swaggerUi.setup(swaggerDocs));

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.send(`${config.appName} API is running`);
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (error instanceof multer.MulterError) {
      const message = error.code === 'LIMIT_FILE_SIZE' ? 'File is too large. The maximum size is 5MB.' : error.message;
      return res.status(400).json({ message });
    }
    if (error instanceof UploadRejectedError) {
      return res.status(400).json({ message: error.message });
    }
    console.error('Unhandled error:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  });

  return app;
};
