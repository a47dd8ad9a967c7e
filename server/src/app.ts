import express from 'express';
import type { Express } from 'express';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { ServerConfig } from './config.js';
import { requireCredential } from './middleware/auth.js';
import { requestLog } from './middleware/requestLog.js';
import { createFileRouter, fileErrorHandler } from './routes/files.js';
import type { ListingPresenter } from './presenter.js';

export interface AppOptions {
  /** Upload ceiling in bytes (default 500 MiB) */
  maxUploadBytes?: number;
  /** Value for Access-Control-Allow-Origin; empty = no CORS headers */
  corsOrigin?: string;
  /** Express `trust proxy` setting; empty = don't trust forwarding headers */
  trustProxy?: string;
  /** POST requests per minute per client; 0 disables the limiter */
  rateLimitWrite?: number;
  logRequests?: boolean;
  presentListing?: ListingPresenter;
}

export function createApp(config: ServerConfig, options: AppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  // Only trust proxy headers when explicitly configured (prevents IP spoofing without proxy)
  if (options.trustProxy) {
    app.set('trust proxy', parseInt(options.trustProxy, 10) || options.trustProxy);
  }

  if (options.logRequests ?? true) {
    app.use(requestLog());
  }

  // Served pages are the user's own files, so no CSP
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(compression());

  // CORS preflights carry no credentials, so answer them ahead of the gate
  if (options.corsOrigin) {
    const origin = options.corsOrigin;
    app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization');
      res.header('Access-Control-Allow-Methods', 'GET, HEAD, POST, OPTIONS');
      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
        return;
      }
      next();
    });
  }

  // Auth gate runs before any routing or body parsing
  app.use(requireCredential(config.credential));

  const writeLimit = options.rateLimitWrite ?? 60;
  if (writeLimit > 0) {
    app.use(rateLimit({
      windowMs: 60 * 1000,
      limit: writeLimit,
      skip: (req) => req.method !== 'POST',
      standardHeaders: true,
      legacyHeaders: false,
      message: 'Too many requests',
    }));
  }

  app.use(createFileRouter(config, {
    maxUploadBytes: options.maxUploadBytes,
    presentListing: options.presentListing,
  }));
  app.use(fileErrorHandler);

  return app;
}
