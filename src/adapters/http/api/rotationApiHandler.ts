import type { IncomingMessage } from 'node:http';
import { createLogger, logManager } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { isLogLevel } from '@/types/logLevel';
import { normalizeSessionId } from '@/domain/rotation/sessionId';
import type { RotationService } from '@/application/rotation/rotationService';
import type { ConfigPort } from '@/ports/ConfigPort';
import {
  MAX_JSON_BODY_BYTES,
  readJsonBody,
  sendJson,
  type JsonRequest,
  type JsonResponse,
} from '@/adapters/http/utils/json';

export type ApiRequest = JsonRequest & Pick<IncomingMessage, 'url' | 'method'>;

type RouteHandler = (req: ApiRequest, res: JsonResponse, match: RegExpMatchArray) => Promise<void> | void;

type Route = {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
};

type RotationApiOptions = {
  service: RotationService;
  configPort: ConfigPort;
  maxBodyBytes?: number;
};

const API_PREFIX = '/api';
const SESSION_ID = '([^/]+)';

/**
 * Command surface under `/api`: join/leave/mute sessions and read status,
 * weather and catalog.
 */
export class RotationApiHandler {
  private readonly log = createLogger('Http', 'Api');
  private readonly service: RotationService;
  private readonly configPort: ConfigPort;
  private readonly maxBodyBytes: number;
  private readonly routes: Route[];

  constructor(options: RotationApiOptions) {
    this.service = options.service;
    this.configPort = options.configPort;
    this.maxBodyBytes = options.maxBodyBytes ?? MAX_JSON_BODY_BYTES;
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return this.normalizeApiPath(pathname) !== null;
  }

  public async handle(req: ApiRequest, res: JsonResponse): Promise<void> {
    const rawPathname = ((req.url ?? '').split('?')[0] ?? '').trim() || '/';
    const pathname = this.normalizeApiPath(rawPathname);
    if (!pathname) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    const method = (req.method ?? 'GET').toUpperCase();

    try {
      const handled = await this.dispatchRoute(pathname, method, req, res);
      if (!handled) {
        sendJson(res, 404, { error: 'route-not-found' });
      }
    } catch (error) {
      this.log.error('api error', { method, pathname, message: errorMessage(error) });
      if (!res.writableEnded) {
        sendJson(res, 500, { error: 'api-error' });
      }
    }
  }

  private normalizeApiPath(pathname: string): string | null {
    const raw = (pathname.split('?')[0] ?? '').trim() || '/';
    if (raw !== API_PREFIX && !raw.startsWith(`${API_PREFIX}/`)) {
      return null;
    }
    const trimmed = raw.slice(API_PREFIX.length).replace(/\/+$/, '');
    return trimmed || '/';
  }

  private async dispatchRoute(
    pathname: string,
    method: string,
    req: ApiRequest,
    res: JsonResponse,
  ): Promise<boolean> {
    let pathMatched = false;
    for (const route of this.routes) {
      const match = pathname.match(route.pattern);
      if (!match) {
        continue;
      }
      pathMatched = true;
      if (route.method !== method) {
        continue;
      }
      await route.handler(req, res, match);
      return true;
    }
    if (pathMatched) {
      sendJson(res, 405, { error: 'method-not-allowed' });
      return true;
    }
    return false;
  }

  private buildRoutes(): Route[] {
    return [
      {
        method: 'GET',
        pattern: /^\/ping$/,
        handler: (_req, res) => sendJson(res, 200, { message: 'Pong!' }),
      },
      {
        method: 'GET',
        pattern: /^\/weather$/,
        handler: async (_req, res) => sendJson(res, 200, await this.service.currentWeather()),
      },
      {
        method: 'GET',
        pattern: /^\/catalog$/,
        handler: (_req, res) => {
          const entries = this.service.listCatalog().map((entry) => ({
            key: entry.legacyKey,
            weather: entry.key.weather,
            hour: entry.key.hour,
            fileName: entry.fileName,
            durationSec: entry.durationSec,
          }));
          sendJson(res, 200, { entries });
        },
      },
      {
        method: 'GET',
        pattern: /^\/sessions$/,
        handler: (_req, res) => sendJson(res, 200, { sessions: this.service.listSessions() }),
      },
      {
        method: 'GET',
        pattern: new RegExp(`^/sessions/${SESSION_ID}$`),
        handler: (_req, res, match) => this.withSession(res, match, (sessionId) => {
          const status = this.service.status(sessionId);
          if (!status) {
            sendJson(res, 404, { error: 'session-not-found' });
            return;
          }
          sendJson(res, 200, status);
        }),
      },
      {
        method: 'DELETE',
        pattern: new RegExp(`^/sessions/${SESSION_ID}$`),
        handler: (_req, res, match) => this.withSession(res, match, (sessionId) => {
          if (!this.service.leave(sessionId)) {
            sendJson(res, 404, { error: 'session-not-found', message: 'Not in a voice channel' });
            return;
          }
          sendJson(res, 200, { message: 'Left voice channel' });
        }),
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/sessions/${SESSION_ID}/play$`),
        handler: (_req, res, match) => this.withSession(res, match, async (sessionId) => {
          const result = await this.service.play(sessionId);
          if (result.success) {
            sendJson(res, 201, result.status);
            return;
          }
          const status = result.reason === 'already-playing' ? 409 : 502;
          sendJson(res, status, { error: result.reason, message: result.message });
        }),
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/sessions/${SESSION_ID}/(mute|unmute)$`),
        handler: (_req, res, match) => this.withSession(res, match, (sessionId) => {
          const result = match[2] === 'mute' ? this.service.mute(sessionId) : this.service.unmute(sessionId);
          if (result.success) {
            sendJson(res, 200, { muted: result.muted });
            return;
          }
          const status = result.reason === 'not-found' ? 404 : 409;
          sendJson(res, status, { error: result.reason, message: result.message });
        }),
      },
      {
        method: 'PUT',
        pattern: /^\/logging$/,
        handler: (req, res) => this.handleLogLevel(req, res),
      },
    ];
  }

  private async withSession(
    res: JsonResponse,
    match: RegExpMatchArray,
    handler: (sessionId: string) => Promise<void> | void,
  ): Promise<void> {
    let decoded: string | null = null;
    try {
      decoded = normalizeSessionId(decodeURIComponent(match[1] ?? ''));
    } catch {
      decoded = null;
    }
    if (!decoded) {
      sendJson(res, 400, { error: 'invalid-session-id' });
      return;
    }
    await handler(decoded);
  }

  private async handleLogLevel(req: ApiRequest, res: JsonResponse): Promise<void> {
    const body = await readJsonBody(req, res, this.maxBodyBytes);
    if (res.writableEnded) {
      return;
    }
    const level = typeof body === 'object' && body !== null && 'level' in body ? body.level : undefined;
    if (!isLogLevel(level)) {
      sendJson(res, 400, { error: 'invalid-log-level' });
      return;
    }
    logManager.configure({ level });
    await this.configPort.updateConfig((config) => {
      config.logging.consoleLevel = level;
    });
    this.log.info('log level updated', { level });
    sendJson(res, 200, { level });
  }
}
