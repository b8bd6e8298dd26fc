/**
 * HealthServer -- HTTP liveness endpoint for the supervised bot.
 *
 * Runs on the same event loop as the restart controller and reads its
 * state only through `SupervisorStateReader.snapshot()`. Both probes run in
 * parallel for each request. Uses the Node.js built-in `http` module.
 *
 * Routes:
 *   GET|HEAD /health          - JSON report, 200 healthy / 503 otherwise
 *   GET|HEAD / and /status    - the same report as an HTML page
 *   anything else             - 404
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { HealthServerError, toError, type ISupervisorObserver } from '@botkeeper/core';
import type { SupervisorStateReader } from '@botkeeper/supervisor';
import {
  buildHealthReport,
  errorBody,
  type HealthReportResult,
  type HealthStatus,
  type IdentityProbe,
  type SystemProbe,
} from './health-report.js';
import { renderStatusPage } from './status-page.js';

export interface HealthServerOptions {
  port: number;
  /** Interface to bind. Default all interfaces. */
  host?: string;
  state: SupervisorStateReader;
  identityProbe: IdentityProbe;
  systemProbe: SystemProbe;
  observer?: ISupervisorObserver;
}

interface Reply {
  statusCode: number;
  contentType: string;
  body: string;
  healthStatus?: HealthStatus;
}

const JSON_TYPE = 'application/json';
const HTML_TYPE = 'text/html; charset=utf-8';

export class HealthServer {
  private server: Server | null = null;
  private readonly options: HealthServerOptions;

  constructor(options: HealthServerOptions) {
    this.options = options;
  }

  /** Port actually bound (useful with port 0). */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.options.port;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Start listening on the configured port. Rejects with HealthServerError. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          this.options.observer?.onError(toError(err), { component: 'health_server', path: req.url });
          if (!res.headersSent) {
            this.send(res, req, {
              statusCode: 500,
              contentType: JSON_TYPE,
              body: JSON.stringify({ error: 'Internal server error' }),
            });
          }
        });
      });

      const onListenError = (err: Error) => {
        const { port, host } = this.options;
        const errno = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
        reject(
          new HealthServerError(
            `Health server could not listen on ${host ?? '*'}:${port}: ${err.message}`,
            port,
            { host, errno },
          ),
        );
      };

      server.once('error', onListenError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onListenError);
        this.server = server;
        server.on('error', (err) => {
          this.options.observer?.onError(err, { component: 'health_server' });
        });
        resolve();
      });
    });
  }

  /** Stop accepting connections and drop idle keep-alive sockets. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const path = (req.url ?? '/').split('?')[0] ?? '/';

    const reply = await this.route(method, path);
    this.send(res, req, reply);

    this.options.observer?.onHealthRequest({
      method,
      path,
      statusCode: reply.statusCode,
      healthStatus: reply.healthStatus,
      duration: Date.now() - started,
      remoteAddress: req.socket.remoteAddress,
    });
  }

  private async route(method: string, path: string): Promise<Reply> {
    const readable = method === 'GET' || method === 'HEAD';
    const format = path === '/health' ? 'json' : path === '/' || path === '/status' ? 'html' : null;

    if (!readable || !format) {
      return { statusCode: 404, contentType: JSON_TYPE, body: JSON.stringify({ error: 'Not found' }) };
    }

    if (this.options.state.terminationSignal.aborted) {
      return this.errorReply('shutting down');
    }

    let result: HealthReportResult;
    try {
      result = await this.report();
    } catch (err) {
      return this.errorReply(toError(err).message);
    }

    const { statusCode, report } = result;
    return format === 'json'
      ? { statusCode, contentType: JSON_TYPE, body: JSON.stringify(report), healthStatus: report.status }
      : { statusCode, contentType: HTML_TYPE, body: renderStatusPage(report), healthStatus: report.status };
  }

  private async report(): Promise<HealthReportResult> {
    const [identity, system] = await Promise.all([
      this.options.identityProbe.check(),
      this.options.systemProbe.sample(),
    ]);
    return buildHealthReport({ snapshot: this.options.state.snapshot(), identity, system });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private errorReply(message: string): Reply {
    return {
      statusCode: 503,
      contentType: JSON_TYPE,
      body: JSON.stringify(errorBody(message)),
      healthStatus: 'error',
    };
  }

  private send(res: ServerResponse, req: IncomingMessage, reply: Reply): void {
    res.writeHead(reply.statusCode, {
      'Content-Type': reply.contentType,
      'Content-Length': Buffer.byteLength(reply.body),
      'Cache-Control': 'no-store',
    });
    res.end(req.method === 'HEAD' ? undefined : reply.body);
  }
}
