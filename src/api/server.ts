/**
 * HTTP Server for the Option Edge Calculator
 *
 * Serves the calculator form and a JSON evaluation endpoint.
 * All calculation goes through evaluate().
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import { evaluate } from '../evaluation/evaluate.js';
import { renderPage } from './view.js';
import { setLogLevel, type DiagnosticsLogger } from '../utils/logger.js';
import type { ApiResponse, AppConfig, EvaluationResult, RawFields } from '../core/types.js';

export interface ServerDeps {
  logger: DiagnosticsLogger;
}

/**
 * Keep string values only; anything else counts as not submitted
 */
export function toRawFields(body: unknown): RawFields {
  const fields: RawFields = {};
  if (typeof body !== 'object' || body === null) {
    return fields;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      fields[key] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      fields[key] = String(value);
    }
  }
  return fields;
}

// ============================================================================
// APP SETUP
// ============================================================================

export function createApp(deps: ServerDeps): Express {
  const { logger } = deps;
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, { ip: req.ip });
    next();
  });

  // ==========================================================================
  // ROUTES
  // ==========================================================================

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        uptime: process.uptime(),
      },
      timestamp: new Date(),
    });
  });

  // Form
  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(renderPage());
  });

  app.post('/', (req: Request, res: Response) => {
    const fields = toRawFields(req.body);
    const outcome = evaluate(fields, { logger });

    const page = outcome.success
      ? renderPage({ fields, result: outcome.data })
      : renderPage({ fields, error: outcome.error.message });

    res.type('html').send(page);
  });

  // JSON API
  app.post('/api/evaluate', (req: Request, res: Response) => {
    const outcome = evaluate(toRawFields(req.body), { logger });

    if (outcome.success) {
      const response: ApiResponse<EvaluationResult> = {
        success: true,
        data: outcome.data,
        timestamp: new Date(),
      };
      res.json(response);
      return;
    }

    const status = outcome.error.code === 'INTERNAL_ERROR' ? 500 : 400;
    const response: ApiResponse<EvaluationResult> = {
      success: false,
      error: outcome.error.message,
      code: outcome.error.code,
      timestamp: new Date(),
    };
    res.status(status).json(response);
  });

  // Malformed bodies and anything else express raises
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.warn('Request failed', { error: String(error) });
    res.status(400).json({
      success: false,
      error: 'Malformed request',
      code: 'BAD_REQUEST',
      timestamp: new Date(),
    });
  });

  return app;
}

// ============================================================================
// SERVER START
// ============================================================================

export function startServer(config: AppConfig, logger: DiagnosticsLogger): Promise<Server> {
  setLogLevel(config.logging.level);
  const app = createApp({ logger });
  const { host, port } = config.server;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Option edge calculator listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
