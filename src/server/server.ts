import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import log from 'loglevel';
import type { ServerConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { loadCommonPasswords } from '../checker/common-passwords.js';
import { evaluatePassword } from '../checker/scoring.js';
import { summarizeLogs } from '../logs/analyzer.js';

export const MAX_BODY_SIZE = '16kb';

export function readPassword(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('password' in body)) return null;
  return typeof body.password === 'string' ? body.password : null;
}

/** Status of a client error that is safe to report as such (body-parser sets `expose`). */
export function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('status' in err) || !('expose' in err) || err.expose !== true) return null;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export class CheckerServer {
  private app = express();
  private config: ServerConfig;
  private server: Server | null = null;

  constructor(cfg: ServerConfig) {
    this.config = cfg;
    this.setupRoutes();
  }

  get handler(): express.Express {
    return this.app;
  }

  private setupRoutes() {
    this.app.use(express.json({ limit: MAX_BODY_SIZE }));

    // Password is never echoed back or logged.
    this.app.post('/api/check', (req, res, next) => {
      const password = readPassword(req.body);
      if (password === null) {
        res.status(400).json({ error: 'password required' });
        return;
      }
      loadCommonPasswords(this.config.commonListPath)
        .then(common => {
          const result = evaluatePassword(password, common);
          log.debug(`[server] check -> ${result.score} (${result.rating})`);
          res.json(result);
        })
        .catch(next);
    });

    this.app.get('/api/logs', (_, res, next) => {
      summarizeLogs(this.config.logDir)
        .then(summary => res.json({ status: 'working', ...summary }))
        .catch(next);
    });

    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = clientErrorStatus(err);
      if (status !== null) {
        log.debug(`[server] rejected request: ${status}`);
        res.status(status).json({ error: status === 413 ? 'request body too large' : 'invalid request body' });
        return;
      }
      log.error('[server] request failed:', errorMessage(err));
      res.status(500).json({ error: 'internal error' });
    });
  }

  /** Resolves with the bound port (useful when configured with port 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, () => {
        const addr = server.address();
        const port = typeof addr === 'object' && addr !== null ? addr.port : this.config.port;
        log.info(`[server:${port}] listening`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
  }
}

export async function startServer(cfg: ServerConfig): Promise<CheckerServer> {
  const server = new CheckerServer(cfg);
  await server.start();
  return server;
}
