import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler';
import type { WalletService } from './services/wallet.service';
import type { Logger } from './utils/logger';

export interface AppOptions {
  passes?: WalletService;
  orders?: WalletService;
  /** morgan request logging, on by default. */
  requestLogging?: boolean;
  logger?: Logger;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors({
    allowedHeaders: ['Content-Type', 'Authorization', 'If-Modified-Since', 'x-admin-key'],
    origin: '*'
  }));
  app.use(helmet());
  if (options.requestLogging ?? true) {
    app.use(morgan('dev'));
  }
  app.use(express.json());

  // Routes
  for (const service of [options.passes, options.orders]) {
    if (service) {
      app.use(`/api/${service.descriptor.routeSegment}`, service.router());
    }
  }

  // Health check
  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok', version: '0.1.0' });
  });

  app.use(errorHandler(options.logger));

  return app;
}
