import { Command, InvalidArgumentError, Option } from 'commander';
import { FilterPrecedence, ServerOptions, ServerType } from './types.js';
import { OpenAPIToolServer } from './server.js';
import { BridgeError, ValidationError } from './errors.js';
import { PACKAGE_NAME, PACKAGE_VERSION } from './package-info.js';

export interface CliOptions {
  name?: string;
  host?: string;
  port?: number;
  baseUrl?: string;
  config?: string;
  debug?: boolean;
  serverType?: ServerType;
  authType?: string;
  apiKey?: string;
  apiKeyHeader?: string;
  apiKeyLocation?: string;
  apiKeyParamName?: string;
  bearerToken?: string;
  username?: string;
  password?: string;
  header?: string[];
  methods?: string;
  includePaths?: string;
  excludePaths?: string;
  includeTags?: string;
  excludeTags?: string;
  filterPrecedence?: FilterPrecedence;
  maxToolNameLength?: number;
  timeout?: number;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toServerOptions(source: string, options: CliOptions): ServerOptions {
  return {
    source,
    name: options.name,
    host: options.host,
    port: options.port,
    baseUrl: options.baseUrl,
    configFile: options.config,
    debug: options.debug,
    serverType: options.serverType,
    authType: options.authType,
    apiKey: options.apiKey,
    apiKeyHeader: options.apiKeyHeader,
    apiKeyLocation: options.apiKeyLocation,
    apiKeyParamName: options.apiKeyParamName,
    bearerToken: options.bearerToken,
    username: options.username,
    password: options.password,
    headers: options.header,
    methods: options.methods,
    includePaths: options.includePaths,
    excludePaths: options.excludePaths,
    includeTags: options.includeTags,
    excludeTags: options.excludeTags,
    filterPrecedence: options.filterPrecedence,
    maxToolNameLength: options.maxToolNameLength,
    timeoutMs: options.timeout
  };
}

/** One line per problem, the way the process reports fatal startup errors. */
export function formatStartupError(error: unknown): string[] {
  if (error instanceof ValidationError) {
    return error.errors.map(message => `❌ Filter error: ${message}`);
  }
  if (error instanceof BridgeError) {
    return error.errors.map(message => `❌ Error: ${message}`);
  }
  return [`❌ Failed to start server: ${(error as Error).message}`];
}

export function createProgram(start: (options: ServerOptions) => Promise<void> = startServer): Command {
  const program = new Command();

  program
    .name(PACKAGE_NAME)
    .description('Expose the operations of an OpenAPI document as MCP tools')
    .version(PACKAGE_VERSION)
    .argument('<openapi-source>', 'OpenAPI document: file path or http(s) URL')
    .option('--name <name>', 'Server name (default: "OpenAPI MCP Server")')
    .option('--host <host>', 'Host to bind in http and sse modes (default: "0.0.0.0")')
    .option('--port <number>', 'Port to bind in http and sse modes (default: 8000)', parseInteger)
    .option('--base-url <url>', 'Override the base URL for API requests')
    .option('-c, --config <file>', 'JSON configuration file; command-line options take precedence')
    .option('--debug', 'Enable debug logging')
    .addOption(new Option('-t, --server-type <type>', 'Transport for the MCP server (default: stdio)')
      .choices(['stdio', 'http', 'sse'])
      .env('SERVER_TYPE'))
    // Authentication
    .addOption(new Option('--auth-type <type>', 'Authentication type (default: none)')
      .choices(['none', 'api_key', 'bearer', 'basic']))
    .addOption(new Option('--api-key <key>', 'API key').env('API_KEY'))
    .option('--api-key-header <name>', 'Header name for the API key (default: "X-API-Key")')
    .addOption(new Option('--api-key-location <location>', 'Where to send the API key (default: header)')
      .choices(['header', 'query'])
      .env('API_KEY_LOCATION'))
    .addOption(new Option('--api-key-param-name <name>', 'Query parameter for the API key (default: "key")')
      .env('API_KEY_PARAM_NAME'))
    .addOption(new Option('--bearer-token <token>', 'Bearer token').env('BEARER_TOKEN'))
    .addOption(new Option('--username <username>', 'Username for basic auth').env('USERNAME'))
    .addOption(new Option('--password <password>', 'Password for basic auth').env('PASSWORD'))
    .option('--header <header>', 'Custom header "Name: Value", repeatable', collect)
    // Operation filtering
    .option('--methods <methods>', 'Comma-separated HTTP methods to include')
    .option('--include-paths <patterns>', 'Comma-separated path patterns to include')
    .option('--exclude-paths <patterns>', 'Comma-separated path patterns to exclude')
    .option('--include-tags <tags>', 'Comma-separated tags to include')
    .option('--exclude-tags <tags>', 'Comma-separated tags to exclude')
    .addOption(new Option('--filter-precedence <mode>', 'How include and exclude filters interact (default: exclusion-wins)')
      .choices(['exclusion-wins', 'declared-order']))
    .option('--max-tool-name-length <number>', 'Maximum length for generated tool names (default: 64)', parseInteger)
    .option('--timeout <ms>', 'Timeout for document fetches and API calls (default: 30000)', parseInteger)
    .addHelpText('after', `
Examples:
  $ ${PACKAGE_NAME} https://api.example.com/openapi.json
  $ ${PACKAGE_NAME} ./openapi.yaml -t http --port 8080 --auth-type api_key --api-key test-key
  $ ${PACKAGE_NAME} openapi.json --methods GET,POST --include-paths "/api/.*"`)
    .action(async (source: string, options: CliOptions) => {
      await start(toServerOptions(source, options));
    });

  return program;
}

async function startServer(options: ServerOptions): Promise<void> {
  const server = new OpenAPIToolServer(options);

  try {
    await server.run();
  } catch (error) {
    for (const line of formatStartupError(error)) {
      console.error(line);
    }
    if (options.debug && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  process.once('SIGINT', () => {
    console.error('\n👋 Server stopped by user');
    server.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  });
}
