import { createServer, IncomingMessage, ServerResponse } from 'http';
import { URL } from 'url';
import { validateGenerationRequest, type ProjectOrchestrator } from '../core/orchestrator/index.js';
import { EngineError, NotFoundError, ValidationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { rateLimit } from '../middleware/rateLimit.js';

export interface ApiServerOptions {
  orchestrator: ProjectOrchestrator;
  maxBodySize?: number;
}

type RouteHandler = (req: IncomingMessage, res: ServerResponse, params: Record<string, string>, query: URLSearchParams) => Promise<void>;

class PayloadTooLargeError extends Error {}

const PUBLIC_ENDPOINTS = ['/api/v1/health'];

const log = createLogger('api');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(query: URLSearchParams, name: string): number | undefined {
  const value = query.get(name);
  return value === null || value === '' ? undefined : Number(value);
}

function flag(query: URLSearchParams, name: string): boolean {
  const value = query.get(name);
  return value === 'true' || value === '1';
}

/**
 * null for a malformed escape such as `%E0`, so the route does not match
 */
function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

/**
 * HTTP surface of the engine. Maps routes onto orchestrator calls and
 * serializes results; every route except health passes the rate limiter first.
 */
export class ApiServer {
  private server: ReturnType<typeof createServer>;
  private routes: Map<string, Map<string, RouteHandler>> = new Map();
  private orchestrator: ProjectOrchestrator;
  private maxBodySize: number;

  constructor(options: ApiServerOptions) {
    this.orchestrator = options.orchestrator;
    this.maxBodySize = options.maxBodySize || 1048576;
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error('Unhandled request failure', { error: error instanceof Error ? error.message : String(error) });
      });
    });
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.route('GET', '/api/v1/health', this.healthCheck);

    this.route('GET', '/api/v1/projects', this.getProjectsForDate);
    this.route('GET', '/api/v1/projects/daily', this.getDailyProjects);
    this.route('POST', '/api/v1/projects/generate', this.generateProjects);
    this.route('GET', '/api/v1/projects/project/:id', this.getProjectById);
    this.route('GET', '/api/v1/projects/stats', this.getStats);
    this.route('GET', '/api/v1/projects/archive', this.getArchive);
    this.route('DELETE', '/api/v1/projects/cache', this.clearCache);
  }

  private route(method: string, path: string, handler: RouteHandler): void {
    let methodRoutes = this.routes.get(method);
    if (!methodRoutes) {
      methodRoutes = new Map();
      this.routes.set(method, methodRoutes);
    }
    methodRoutes.set(path, handler.bind(this));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);

      if (!PUBLIC_ENDPOINTS.includes(url.pathname)) {
        const admitted = await rateLimit(req, res, (callerKey) => this.orchestrator.admitRequest(callerKey));
        if (!admitted) {
          return;
        }
      }

      const methodRoutes = this.routes.get(req.method || 'GET');
      if (!methodRoutes) {
        this.sendJson(res, 405, { error: 'Method not allowed' });
        return;
      }

      for (const [pattern, handler] of methodRoutes) {
        const params = this.matchRoute(pattern, url.pathname);
        if (params !== null) {
          await handler(req, res, params, url.searchParams);
          return;
        }
      }

      this.sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private matchRoute(pattern: string, pathname: string): Record<string, string> | null {
    const patternParts = pattern.split('/');
    const pathParts = pathname.split('/');

    if (patternParts.length !== pathParts.length) return null;

    const params: Record<string, string> = {};

    for (let i = 0; i < patternParts.length; i++) {
      if (patternParts[i].startsWith(':')) {
        const value = decodePathSegment(pathParts[i]);
        if (value === null) return null;
        params[patternParts[i].slice(1)] = value;
      } else if (patternParts[i] !== pathParts[i]) {
        return null;
      }
    }

    return params;
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  private sendError(res: ServerResponse, error: unknown): void {
    if (res.headersSent) {
      return;
    }

    if (error instanceof ValidationError) {
      this.sendJson(res, 422, { error: error.message, code: error.code, field: error.field });
    } else if (error instanceof NotFoundError) {
      this.sendJson(res, 404, { error: error.message, code: error.code });
    } else if (error instanceof PayloadTooLargeError) {
      this.sendJson(res, 413, { error: 'Request body too large', code: 'PAYLOAD_TOO_LARGE', maxSize: this.maxBodySize });
    } else if (error instanceof SyntaxError) {
      this.sendJson(res, 400, { error: 'Invalid JSON' });
    } else {
      log.error('API error', {
        error: error instanceof Error ? error.message : String(error),
        code: error instanceof EngineError ? error.code : undefined,
      });
      this.sendJson(res, 500, { error: 'Internal server error' });
    }
  }

  private parseBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      let body = '';
      let totalSize = 0;
      let limitExceeded = false;

      req.on('data', (chunk: Buffer) => {
        if (limitExceeded) return;

        totalSize += chunk.length;
        if (totalSize > this.maxBodySize) {
          limitExceeded = true;
          reject(new PayloadTooLargeError('Payload too large'));
          return;
        }

        body += chunk.toString();
      });

      req.on('end', () => {
        if (limitExceeded) return;

        try {
          resolve(JSON.parse(body || '{}'));
        } catch (error) {
          reject(error);
        }
      });

      req.on('error', reject);
    });
  }

  // Route handlers
  private async healthCheck(_req: IncomingMessage, res: ServerResponse): Promise<void> {
    const report = await this.orchestrator.health();
    this.sendJson(res, report.status === 'ok' ? 200 : 503, report);
  }

  private async getDailyProjects(_req: IncomingMessage, res: ServerResponse, _params: Record<string, string>, query: URLSearchParams): Promise<void> {
    const batch = await this.orchestrator.getDaily({
      count: optionalNumber(query, 'count'),
      forceRegenerate: flag(query, 'force_regenerate'),
    });
    this.sendJson(res, 200, batch);
  }

  private async getProjectsForDate(_req: IncomingMessage, res: ServerResponse, _params: Record<string, string>, query: URLSearchParams): Promise<void> {
    const batch = await this.orchestrator.getDaily({
      date: query.get('date') || undefined,
      count: optionalNumber(query, 'count'),
      forceRegenerate: flag(query, 'force_regenerate'),
    });
    this.sendJson(res, 200, batch);
  }

  private async generateProjects(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    if (!isRecord(body)) {
      throw new ValidationError('request body must be a JSON object', 'body');
    }

    // Both camelCase and snake_case field names are accepted
    const input = {
      count: body.count,
      difficultyPreference: body.difficultyPreference ?? body.difficulty_preference,
      categoryPreference: body.categoryPreference ?? body.category_preference,
      forceRegenerate: body.forceRegenerate ?? body.force_regenerate,
    };

    const { projects, degraded } = await this.orchestrator.generateCustom(validateGenerationRequest(input));
    if (degraded) {
      res.setHeader('X-Generation-Degraded', 'true');
    }
    this.sendJson(res, 200, projects);
  }

  private async getProjectById(_req: IncomingMessage, res: ServerResponse, params: Record<string, string>): Promise<void> {
    const project = await this.orchestrator.getById(params.id);
    this.sendJson(res, 200, project);
  }

  private async getStats(_req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.sendJson(res, 200, await this.orchestrator.getStats());
  }

  private async getArchive(_req: IncomingMessage, res: ServerResponse, _params: Record<string, string>, query: URLSearchParams): Promise<void> {
    const archive = await this.orchestrator.getArchive(optionalNumber(query, 'days'));
    this.sendJson(res, 200, archive);
  }

  private async clearCache(_req: IncomingMessage, res: ServerResponse, _params: Record<string, string>, query: URLSearchParams): Promise<void> {
    const date = query.get('date') || undefined;
    const removed = await this.orchestrator.clearCache(date);
    this.sendJson(res, 200, { removed, date: date ?? null });
  }

  start(port: number, host = '0.0.0.0'): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(port, host, () => {
        log.info('API server listening', { url: `http://${host}:${this.port}` });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  get port(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : 0;
  }
}

export function createApiServer(options: ApiServerOptions): ApiServer {
  return new ApiServer(options);
}
