import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api';
import { config } from './config';
import { ProbeTool } from './video/ffprobe';

export function createApp(prober?: ProbeTool): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // API routes
  app.use('/api', createApiRouter(prober));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err.message);

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    res.status(500).json({
      error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
