import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestId, requestLogger } from './middleware/request-context';
import { GeneQueryService } from './services/query-service';
import { WelcomeResponse } from './types';

// Routes
import createGenesRouter from './routes/genes';
import createHealthRouter from './routes/health';

export function createApp(queryService: GeneQueryService): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: '*',
    methods: ['GET'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  }));
  app.use(requestId);
  app.use(requestLogger);

  app.get('/', (_req, res) => {
    const body: WelcomeResponse = { message: `Welcome to ${config.api.title}` };
    res.json(body);
  });

  // Routes
  app.use('/genes', createGenesRouter(queryService));
  app.use('/health', createHealthRouter(queryService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
