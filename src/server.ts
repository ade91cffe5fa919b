import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  InitializedNotificationSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import express from 'express';
import cors from 'cors';
import http from 'http';
import {
  OpenAPIDocument,
  OperationDescriptor,
  ServerOptions,
  ToolBinding,
  ToolCallResult,
  ValidatedServerConfig
} from './types.js';
import { Telemetry } from './telemetry.js';
import { ServerConfigManager } from './server-config.js';
import { loadOpenAPIDocument, resolveBaseUrl } from './openapi-loader.js';
import { extractOperations } from './operations.js';
import { classifyOperations, describeOperation } from './classifier.js';
import { buildRequestAugmentation } from './auth.js';
import { ApiClient } from './api-client.js';
import { HttpSetup, ListedTool } from './httpSetup.js';
import { SseSetup } from './sseSetup.js';
import { getPackageInfo, PACKAGE_VERSION } from './package-info.js';

export class OpenAPIToolServer {
  private server: Server;
  private app: express.Application;
  private telemetry: Telemetry;
  private configManager: ServerConfigManager;
  private config?: ValidatedServerConfig;
  private document?: OpenAPIDocument;
  private tools: Map<string, ToolBinding> = new Map();
  private excluded: OperationDescriptor[] = [];
  private apiClient?: ApiClient;
  private httpSetup?: HttpSetup;
  private sseSetup?: SseSetup;
  private listener?: http.Server;
  private serverName: string;

  constructor(options: ServerOptions) {
    this.telemetry = new Telemetry({
      verbose: options.debug ?? false,
      isStdioMode: (options.serverType ?? 'stdio') === 'stdio'
    });
    this.configManager = new ServerConfigManager(options, this.telemetry);
    this.serverName = options.name ?? 'OpenAPI MCP Server';

    this.server = this.createProtocolServer();
    this.telemetry.setContext({ server: this.server });

    this.app = express();
  }

  /**
   * Validates configuration, loads the document and builds the tool table.
   * Every configuration problem surfaces here, before anything is served.
   */
  async initialize(document?: OpenAPIDocument): Promise<void> {
    const config = this.configManager.initialize();
    this.config = config;
    this.telemetry.setContext({ verbose: config.debug, isStdioMode: config.serverType === 'stdio' });

    this.telemetry.debug('🚀 Initializing OpenAPI tool server...');
    this.document = document ?? await loadOpenAPIDocument(config.source, config.timeoutMs);

    const baseUrl = resolveBaseUrl(this.document, config.baseUrl, config.source);
    const source = config.baseUrl ? 'CLI --base-url' : 'document servers';
    this.telemetry.debug(`🌐 Using base URL: ${baseUrl} (from ${source})`);

    const info = this.document.info;
    this.telemetry.debug(`📋 API: ${info?.title ?? 'Unknown API'} v${info?.version ?? '1.0.0'}`);

    const operations = extractOperations(this.document);
    const classification = classifyOperations(operations, this.configManager.getRouteRules(), {
      baseUrl,
      maxToolNameLength: config.maxToolNameLength
    });
    this.tools = classification.tools;
    this.excluded = classification.excluded;

    this.apiClient = new ApiClient(buildRequestAugmentation(config.auth), this.telemetry, config.timeoutMs);

    this.telemetry.printToolTableDebug(this.tools, this.excluded);
    this.telemetry.debug(`✅ Loaded ${this.tools.size} tools from ${operations.length} operations`);
  }

  getTools(): ReadonlyMap<string, ToolBinding> {
    return this.tools;
  }

  getExcludedOperations(): readonly OperationDescriptor[] {
    return this.excluded;
  }

  listTools(): ListedTool[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));
  }

  async executeTool(toolName: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const tool = this.tools.get(toolName);
    if (!tool || !this.apiClient) {
      throw new Error(`Tool ${toolName} not found`);
    }
    return this.apiClient.execute(tool, args);
  }

  private getInfo(): Record<string, unknown> {
    const packageInfo = getPackageInfo();
    return {
      server: {
        name: this.config?.name,
        package: packageInfo.name,
        version: packageInfo.version
      },
      api: {
        title: this.document?.info?.title,
        version: this.document?.info?.version
      },
      tools: [...this.tools.values()].map(tool => ({
        name: tool.name,
        operation: describeOperation(tool.operation),
        description: tool.description
      })),
      excluded: this.excluded.map(describeOperation)
    };
  }

  /**
   * Builds an MCP protocol server answering from this tool table. A protocol
   * server holds one transport, so the SSE transport creates one per client.
   */
  createProtocolServer(): Server {
    const server = new Server(
      { name: this.config?.name ?? this.serverName, version: PACKAGE_VERSION },
      { capabilities: { tools: {}, logging: {} } }
    );
    this.setupRequestHandlers(server);
    return server;
  }

  private setupRequestHandlers(server: Server): void {
    server.setNotificationHandler(InitializedNotificationSchema, async () => {
      this.telemetry.debug('✅ MCP client initialized successfully');
    });

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.listTools();
      this.telemetry.debug(`📋 Returning ${tools.length} tools to MCP client`);
      return { tools };
    });

    server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      return this.executeTool(name, args ?? {});
    });
  }

  // For IDE usage (stdio)
  async runStdio(): Promise<void> {
    await this.initialize();
    await this.startStdio();
  }

  // For standalone deployment (HTTP)
  async runHttp(): Promise<void> {
    await this.initialize();
    await this.startHttp();
  }

  // For clients that speak the HTTP+SSE transport
  async runSse(): Promise<void> {
    await this.initialize();
    await this.startSse();
  }

  /** Initializes, then serves on the transport the configuration selects. */
  async run(): Promise<void> {
    await this.initialize();
    switch (this.requireConfig().serverType) {
      case 'http':
        await this.startHttp();
        break;
      case 'sse':
        await this.startSse();
        break;
      default:
        await this.startStdio();
    }
  }

  /** Attaches the main protocol server to a transport the caller has opened. */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /** Port the HTTP or SSE listener is bound to, once started. */
  getListeningPort(): number | undefined {
    const address = this.listener?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  private async startStdio(): Promise<void> {
    await this.connect(new StdioServerTransport());

    this.telemetry.debug(`🔌 Connected over stdio with ${this.tools.size} tools`);
  }

  private async startHttp(): Promise<void> {
    const config = this.requireConfig();
    this.telemetry.setContext({ isStdioMode: false });

    this.app.use(cors());
    this.app.use(express.json());

    this.httpSetup = new HttpSetup({
      app: this.app,
      serverName: config.name,
      telemetry: this.telemetry,
      listTools: () => this.listTools(),
      executeTool: (toolName, args) => this.executeTool(toolName, args),
      info: () => this.getInfo()
    });
    this.httpSetup.setupRoutes();
    this.listener = await this.httpSetup.startServer(config.host, config.port);
  }

  private async startSse(): Promise<void> {
    const config = this.requireConfig();
    this.telemetry.setContext({ isStdioMode: false });

    this.app.use(cors());
    this.app.use(express.json());

    this.sseSetup = new SseSetup({
      app: this.app,
      serverName: config.name,
      telemetry: this.telemetry,
      createServer: () => this.createProtocolServer(),
      toolCount: () => this.tools.size
    });
    this.sseSetup.setupRoutes();
    this.listener = await this.sseSetup.startServer(config.host, config.port);
  }

  async close(): Promise<void> {
    await this.httpSetup?.cleanup();
    await this.sseSetup?.cleanup();
    await this.server.close();
  }

  private requireConfig(): ValidatedServerConfig {
    if (!this.config) {
      throw new Error('Server has not been initialized');
    }
    return this.config;
  }
}
