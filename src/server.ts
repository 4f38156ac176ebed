// HTTP API - maps the volume endpoints onto the volume controller
import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { VolumeController, VolumeState } from './interfaces';
import { ControllerError, ErrorHandler, FailureWarning } from './services';

export const SERVICE_NAME = 'remote-volume-control';

export interface VolumeControlServerOptions {
  host: string;
  port: number;
  /** Reported by /health */
  backend?: string;
  errorHandler?: ErrorHandler;
}

// Field names accepted by POST /api/volume/set, in order of preference
const LEVEL_FIELDS = ['percent', 'level', 'volume'] as const;

function readLevelField(body: unknown): { found: boolean; value: unknown } {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { found: false, value: undefined };
  }
  for (const field of LEVEL_FIELDS) {
    if (field in body) {
      const value: unknown = Reflect.get(body, field);
      if (value !== undefined && value !== null) {
        return { found: true, value };
      }
    }
  }
  return { found: false, value: undefined };
}

// body-parser rejects oversized or badly encoded bodies with a 4xx `status`
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  const status: unknown = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export class VolumeControlServer {
  private app: express.Application;
  private server: Server | null = null;
  private controller: VolumeController;
  private errorHandler: ErrorHandler;
  private options: VolumeControlServerOptions;
  private isRunning: boolean = false;

  constructor(controller: VolumeController, options: VolumeControlServerOptions) {
    this.controller = controller;
    this.options = options;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();

    // Initialize Express app
    this.app = express();
    this.app.disable('x-powered-by');
    this.app.use((req, res, next) => this.tagRequest(req, res, next));
    this.app.use(express.json());

    this.setupRoutes();
    this.setupErrorHandlers();
    this.setupEventHandlers();
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: SERVICE_NAME,
        backend: this.options.backend ?? 'unknown',
        step: this.controller.step,
        isRunning: this.isRunning
      });
    });

    // Volume endpoints
    this.app.get('/api/volume', this.volumeRoute('volume.status', () => this.controller.getStatus()));
    this.app.post('/api/volume/up', this.volumeRoute('volume.up', () => this.controller.increase()));
    this.app.post('/api/volume/down', this.volumeRoute('volume.down', () => this.controller.decrease()));
    this.app.post('/api/volume/mute', this.volumeRoute('volume.mute', () => this.controller.toggleMute()));

    this.app.post('/api/volume/set', (req, res, next) => {
      const { found, value } = readLevelField(req.body);
      if (!found) {
        res.status(400).json({ error: 'percent is required' });
        return;
      }
      this.volumeRoute('volume.set', () => this.controller.setLevel(value))(req, res, next);
    });

    // Error stats endpoint
    this.app.get('/errors', (req, res) => {
      res.json({ failures: this.errorHandler.getFailureStats() });
    });
  }

  private volumeRoute(
    operationName: string,
    action: () => Promise<VolumeState>
  ): (req: Request, res: Response, next: NextFunction) => void {
    return (req, res) => {
      action()
        .then((state) => {
          this.errorHandler.recordSuccess(operationName);
          res.json({ percent: state.percent, muted: state.muted });
        })
        .catch((error: unknown) => {
          const controllerError = ControllerError.fromError(error);
          // Bad input is the client's problem, not a failing operation
          if (controllerError.kind !== 'InvalidInput') {
            this.errorHandler.recordFailure(operationName, controllerError);
          }
          res.status(controllerError.statusCode).json({ error: controllerError.message });
        });
    };
  }

  private tagRequest(req: Request, res: Response, next: NextFunction): void {
    const requestId = uuidv4();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      console.log(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms (${requestId})`);
    });
    next();
  }

  private setupErrorHandlers(): void {
    // Unknown routes
    this.app.use((req, res) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Body parser and unexpected errors; express recognizes this by its arity
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
      }
      const status = clientErrorStatus(error);
      if (status !== null) {
        res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[HTTP] Unhandled error on ${req.method} ${req.originalUrl}:`, message);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private setupEventHandlers(): void {
    // Error handler warnings
    this.errorHandler.on('warning', (warning: FailureWarning) => {
      console.warn(`[WARNING] ${warning.message}`);
    });
  }

  public async start(): Promise<AddressInfo> {
    const { host, port } = this.options;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (error) => this.onServerError(error));
        this.isRunning = true;
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        console.log(`Volume control server running on http://${address.address}:${address.port}`);
        resolve(address);
      });
      this.server = server;

      server.once('error', reject);
    });
  }

  private onServerError(error: Error): void {
    console.error('[HTTP] Server error:', error.message);
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.isRunning = false;
      return;
    }

    console.log('Shutting down volume control server...');
    return new Promise((resolve, reject) => {
      server.close((error) => {
        this.server = null;
        this.isRunning = false;
        if (error) {
          reject(error);
          return;
        }
        console.log('Server stopped');
        resolve();
      });
    });
  }

  // Getter for testing
  public getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }
}
