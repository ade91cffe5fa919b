import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { OperationDescriptor, ToolBinding } from './types.js';
import { PACKAGE_NAME } from './package-info.js';

export interface TelemetryContext {
  verbose: boolean;
  isStdioMode: boolean;
  server?: Server;
}

type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const PREFIXES: Record<LogLevel, string> = {
  debug: '[DEBUG]',
  info: '[INFO]',
  warning: '[WARN]',
  error: '[ERROR]'
};

export class Telemetry {
  constructor(private context: TelemetryContext) {}

  setContext(context: Partial<TelemetryContext>): void {
    this.context = { ...this.context, ...context };
  }

  debug(message: string): void {
    if (this.context.verbose) {
      this.emit('debug', message);
    }
  }

  info(message: string): void {
    if (this.context.verbose) {
      this.emit('info', message);
    }
  }

  warn(message: string): void {
    this.emit('warning', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: LogLevel, message: string): void {
    if (this.context.isStdioMode) {
      // stdout carries the protocol, so logs travel as MCP notifications
      const server = this.context.server;
      if (!server) {
        process.stderr.write(`${PREFIXES[level]} ${message}\n`);
        return;
      }
      server.notification({
        method: 'notifications/message',
        params: { level, logger: PACKAGE_NAME, data: message }
      }).catch(() => {
        // Not connected yet, or the client declined logging
        process.stderr.write(`${PREFIXES[level]} ${message}\n`);
      });
      return;
    }

    switch (level) {
      case 'debug':
        console.debug(`${PREFIXES[level]} ${message}`);
        break;
      case 'info':
        console.info(`${PREFIXES[level]} ${message}`);
        break;
      case 'warning':
        console.warn(`${PREFIXES[level]} ${message}`);
        break;
      case 'error':
        console.error(`${PREFIXES[level]} ${message}`);
        break;
    }
  }

  printToolTableDebug(tools: ReadonlyMap<string, ToolBinding>, excluded: readonly OperationDescriptor[]): void {
    if (!this.context.verbose) {
      return;
    }

    this.info(`📊 LOADED: ${tools.size} tools, ${excluded.length} excluded operations`);
    this.info('├─ Path                                      │ Method  │ Tool');
    this.info('├───────────────────────────────────────────┼─────────┼─────────────────────');

    const rows = [
      ...[...tools.values()].map(tool => ({ path: tool.operation.path, method: tool.operation.method, label: `🔧 ${tool.name}` })),
      ...excluded.map(operation => ({ path: operation.path, method: operation.method, label: '🚫 excluded' }))
    ].sort((a, b) => a.path.localeCompare(b.path) || a.method.localeCompare(b.method));

    for (const row of rows) {
      const pathDisplay = row.path.length > 41 ? row.path.substring(0, 38) + '...' : row.path;
      this.info(`│  ${pathDisplay.padEnd(41)} │ ${row.method.padEnd(7)} │ ${row.label}`);
    }
  }
}
