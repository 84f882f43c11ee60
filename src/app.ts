import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import createEmailRouter from './routes/email.js';
import type { EmailGeneratorService } from './services/emailGeneratorService.js';

export interface AppOptions {
  service: EmailGeneratorService;
  // Empty allows any origin.
  corsOrigins?: string[];
}

// body-parser rejections carry their HTTP status.
const CLIENT_ERRORS: Record<number, string> = {
  400: 'invalid_json',
  413: 'payload_too_large',
  415: 'unsupported_media_type',
};

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp({ service, corsOrigins = [] }: AppOptions) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: corsOrigins.length ? corsOrigins : '*' }));
  app.use(express.json({ limit: '2mb' }));
  app.use(morgan('dev'));

  app.use('/api', createEmailRouter(service));

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) return res.status(400).json({ error: 'invalid_json' });
    const status = clientErrorStatus(err);
    if (status !== null) return res.status(status).json({ error: CLIENT_ERRORS[status] ?? 'bad_request' });
    console.error('[app] unhandled error', err);
    return res.status(500).json({ error: 'server_error' });
  });

  return app;
}
