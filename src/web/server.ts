/**
 * Web collaborator for plugin endpoints
 *
 * One express app with a single dynamic route: plugin endpoints live in a
 * map, so they can be added and removed while the server runs.
 *
 * - GET /health is built in and needs no secret
 * - every other path is looked up in the endpoint map
 * - when web.password is set, plugin endpoints require it (see ./auth.ts)
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import type { AdminNotifier } from '../services/notifier.js';
import { isAuthorized } from './auth.js';
import { logger, errorMessage } from '../utils/logger.js';

export type EndpointHandler = (req: Request, res: Response) => void | Promise<void>;

/**
 * The part of the web server plugins register through
 */
export interface EndpointRegistrar {
  addEndpoint(path: string, handler: EndpointHandler): void;
  removeEndpoint(path: string): boolean;
}

export interface WebServerOptions {
  /** web.password */
  password?: string;
  notifier?: AdminNotifier;
}

/**
 * Endpoint paths always begin with a slash
 */
export function normalizeEndpointPath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

export class WebServer implements EndpointRegistrar {
  readonly app: Express;
  private readonly endpoints = new Map<string, EndpointHandler>();
  private server: Server | null = null;

  constructor(private readonly options: WebServerOptions = {}) {
    this.app = express();
    this.app.use(express.json());

    // Security headers
    this.app.use((_req: Request, res: Response, next: NextFunction) => {
      res.setHeader('X-Content-Type-Options', 'nosniff');
      res.setHeader('X-Frame-Options', 'DENY');
      res.setHeader('Referrer-Policy', 'no-referrer');
      res.setHeader('Cache-Control', 'private, no-cache, no-store, must-revalidate');
      next();
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', endpoints: this.endpoints.size });
    });

    this.app.use((req: Request, res: Response) => {
      void this.route(req, res);
    });
  }

  /**
   * Register a plugin endpoint. Registering an existing path replaces it.
   */
  addEndpoint(path: string, handler: EndpointHandler): void {
    const normalized = normalizeEndpointPath(path);
    if (this.endpoints.has(normalized)) {
      logger.warn('Replacing existing endpoint', { path: normalized });
    }
    this.endpoints.set(normalized, handler);
    logger.debug('Endpoint added', { path: normalized });
  }

  removeEndpoint(path: string): boolean {
    const removed = this.endpoints.delete(normalizeEndpointPath(path));
    if (removed) {
      logger.debug('Endpoint removed', { path: normalizeEndpointPath(path) });
    }
    return removed;
  }

  /**
   * Registered endpoint paths (for debugging)
   */
  getEndpoints(): string[] {
    return Array.from(this.endpoints.keys());
  }

  /**
   * Start listening
   * @returns the bound port (useful with port 0)
   */
  async start(port: number): Promise<number> {
    if (this.server) {
      throw new Error('Web server already started');
    }

    const server = await new Promise<Server>((resolve, reject) => {
      // express 5 hands listen errors to the callback
      const listening = this.app.listen(port, (error?: Error) => {
        if (error) reject(error);
        else resolve(listening);
      });
    });
    this.server = server;

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    logger.info('Web server listening', { port: boundPort });
    return boundPort;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    logger.info('Web server stopped');
  }

  private async route(req: Request, res: Response): Promise<void> {
    const handler = this.endpoints.get(req.path);
    if (!handler) {
      res.status(404).json({ error: 'Not found' });
      return;
    }

    if (!isAuthorized(this.options.password, req.headers.authorization, req.query)) {
      logger.warn('Unauthorized endpoint access attempt', { ip: req.ip, path: req.path });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    try {
      await handler(req, res);
    } catch (error) {
      logger.error('Endpoint handler failed', { path: req.path, error: errorMessage(error) });
      this.options.notifier?.notify(error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal error' });
      }
    }
  }
}
