import express from 'express';
import http from 'http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { Telemetry } from './telemetry.js';
import { PACKAGE_VERSION } from './package-info.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

export interface SseSetupContext {
  app: express.Application;
  serverName: string;
  telemetry: Telemetry;
  createServer: () => Server;
  toolCount: () => number;
}

interface SseConnection {
  transport: SSEServerTransport;
  server: Server;
}

/**
 * HTTP+SSE transport: `GET /sse` opens an event stream and announces where to
 * post, `POST /messages?sessionId=...` carries the client's JSON-RPC messages.
 * Responses travel back over the event stream of the same session.
 */
export class SseSetup {
  private context: SseSetupContext;
  private connections: Map<string, SseConnection> = new Map();
  private httpServer?: http.Server;

  constructor(context: SseSetupContext) {
    this.context = context;
  }

  setupRoutes(): void {
    this.context.app.get(SSE_PATH, (_req, res, next) => {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      const server = this.context.createServer();
      const { sessionId } = transport;

      this.connections.set(sessionId, { transport, server });
      res.on('close', () => {
        this.connections.delete(sessionId);
        this.context.telemetry.debug(`🔌 SSE session ${sessionId} closed`);
      });

      server.connect(transport)
        .then(() => this.context.telemetry.debug(`🆕 Opened SSE session ${sessionId}`))
        .catch(next);
    });

    this.context.app.post(MESSAGES_PATH, (req, res, next) => {
      const sessionId = req.query['sessionId'];
      const connection = typeof sessionId === 'string' ? this.connections.get(sessionId) : undefined;
      if (!connection) {
        res.status(400).json({ error: 'Unknown or missing sessionId. Open an event stream first.' });
        return;
      }
      connection.transport.handlePostMessage(req, res, req.body).catch(next);
    });

    this.context.app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        tools: this.context.toolCount(),
        sessions: this.connections.size,
        version: PACKAGE_VERSION
      });
    });
  }

  startServer(host: string, port: number): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = this.context.app.listen(port, host, () => {
        this.context.telemetry.info(`🚀 ${this.context.serverName} running at http://${host}:${port}`);
        this.context.telemetry.info(`📡 SSE endpoint: http://${host}:${port}${SSE_PATH}`);
        this.context.telemetry.info(`📨 Message endpoint: http://${host}:${port}${MESSAGES_PATH}`);
        resolve(server);
      });
      server.on('error', reject);

      this.httpServer = server;
    });
  }

  async cleanup(): Promise<void> {
    const connections = [...this.connections.values()];
    this.connections.clear();
    await Promise.all(connections.map(connection => connection.server.close()));

    const server = this.httpServer;
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    }
    this.context.telemetry.debug('🧹 SseSetup cleanup completed');
  }
}
