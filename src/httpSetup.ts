import express from 'express';
import http from 'http';
import { randomUUID } from 'crypto';
import { ToolCallResult, ToolInputSchema } from './types.js';
import { Telemetry } from './telemetry.js';
import { PACKAGE_VERSION } from './package-info.js';

export const PROTOCOL_VERSION = '2024-11-05';
const SESSION_TTL_MS = 30 * 60 * 1000;

export interface ListedTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface HttpSetupContext {
  app: express.Application;
  serverName: string;
  telemetry: Telemetry;
  listTools: () => ListedTool[];
  executeTool: (toolName: string, args: Record<string, unknown>) => Promise<ToolCallResult>;
  info: () => Record<string, unknown>;
}

interface MCPSession {
  sessionId: string;
  clientInfo: { name: string; version: string };
  createdAt: Date;
  lastActivity: Date;
}

interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
  id?: string | number | null;
}

export interface RpcReply {
  status: number;
  body?: Record<string, unknown>;
  sessionId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  return isRecord(value) && value['jsonrpc'] === '2.0' && typeof value['method'] === 'string';
}

/**
 * Streamable-HTTP style JSON-RPC endpoint without SSE: `initialize` opens a
 * session returned in `Mcp-Session-Id`, every later call must send it back.
 */
export class HttpSetup {
  private context: HttpSetupContext;
  private sessions: Map<string, MCPSession> = new Map();
  private sessionCleanupInterval?: NodeJS.Timeout;
  private httpServer?: http.Server;

  constructor(context: HttpSetupContext) {
    this.context = context;
  }

  setupRoutes(): void {
    this.context.app.post('/mcp', (req, res, next) => {
      this.handleRpc(req.body, req.header('mcp-session-id'))
        .then(reply => {
          if (reply.sessionId) {
            res.setHeader('Mcp-Session-Id', reply.sessionId);
          }
          if (reply.body) {
            res.status(reply.status).json(reply.body);
          } else {
            res.status(reply.status).end();
          }
        })
        .catch(next);
    });

    this.context.app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        tools: this.context.listTools().length,
        sessions: this.sessions.size,
        version: PACKAGE_VERSION
      });
    });

    this.context.app.get('/info', (_req, res) => {
      res.json(this.context.info());
    });
  }

  async handleRpc(payload: unknown, sessionId?: string): Promise<RpcReply> {
    if (!isJsonRpcRequest(payload)) {
      return {
        status: 400,
        body: { jsonrpc: '2.0', error: { code: -32600, message: 'Invalid Request' }, id: null }
      };
    }

    const { method, params, id = null } = payload;
    this.context.telemetry.debug(`MCP method call: ${method}`);

    if (method === 'initialize') {
      const session = this.createSession(params?.['clientInfo']);
      return {
        status: 200,
        sessionId: session.sessionId,
        body: {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: { name: this.context.serverName, version: PACKAGE_VERSION }
          }
        }
      };
    }

    if (!sessionId) {
      return {
        status: 400,
        body: { jsonrpc: '2.0', error: { code: -32602, message: 'Missing Mcp-Session-Id header. Call initialize first.' }, id }
      };
    }
    if (!this.touchSession(sessionId)) {
      return {
        status: 404,
        body: { jsonrpc: '2.0', error: { code: -32001, message: 'Invalid or expired session. Please reinitialize.' }, id }
      };
    }

    // Notifications carry no id and get no response body
    if (method.startsWith('notifications/')) {
      return { status: 202 };
    }

    try {
      const result = await this.dispatch(method, params ?? {});
      return { status: 200, body: { jsonrpc: '2.0', id, result } };
    } catch (error) {
      return {
        status: 200,
        body: { jsonrpc: '2.0', error: { code: -32603, message: (error as Error).message }, id }
      };
    }
  }

  private async dispatch(method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: this.context.listTools() };
      case 'tools/call': {
        const toolName = params['name'];
        if (typeof toolName !== 'string' || !toolName) {
          throw new Error('Tool name is required');
        }
        const args = params['arguments'];
        return this.context.executeTool(toolName, isRecord(args) ? args : {});
      }
      default:
        throw new Error(`Unknown method: ${method}`);
    }
  }

  private createSession(clientInfo: unknown): MCPSession {
    const info = isRecord(clientInfo) && typeof clientInfo['name'] === 'string'
      ? { name: clientInfo['name'], version: String(clientInfo['version'] ?? 'unknown') }
      : { name: 'unknown', version: 'unknown' };
    const session: MCPSession = {
      sessionId: randomUUID(),
      clientInfo: info,
      createdAt: new Date(),
      lastActivity: new Date()
    };
    this.sessions.set(session.sessionId, session);
    this.context.telemetry.debug(`🆕 Created MCP session ${session.sessionId} for ${info.name}`);
    return session;
  }

  private touchSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.lastActivity = new Date();
    return true;
  }

  cleanupExpiredSessions(now: Date = new Date()): number {
    let cleanedCount = 0;
    for (const [sessionId, session] of this.sessions) {
      if (now.getTime() - session.lastActivity.getTime() > SESSION_TTL_MS) {
        this.sessions.delete(sessionId);
        cleanedCount++;
      }
    }
    if (cleanedCount > 0) {
      this.context.telemetry.debug(`🧹 Cleaned up ${cleanedCount} expired MCP sessions`);
    }
    return cleanedCount;
  }

  startServer(host: string, port: number): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = this.context.app.listen(port, host, () => {
        this.context.telemetry.info(`🚀 ${this.context.serverName} running at http://${host}:${port}`);
        this.context.telemetry.info(`📡 MCP endpoint: http://${host}:${port}/mcp`);
        this.context.telemetry.info(`📊 Health check: http://${host}:${port}/health`);
        resolve(server);
      });
      server.on('error', reject);

      this.httpServer = server;
      this.sessionCleanupInterval = setInterval(() => this.cleanupExpiredSessions(), 5 * 60 * 1000);
      this.sessionCleanupInterval.unref();
    });
  }

  async cleanup(): Promise<void> {
    if (this.sessionCleanupInterval) {
      clearInterval(this.sessionCleanupInterval);
    }
    this.sessions.clear();
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    }
    this.context.telemetry.debug('🧹 HttpSetup cleanup completed');
  }
}
