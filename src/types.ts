export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export type JsonSchema = Record<string, unknown>;

export interface OpenAPIDocument {
  openapi?: string;
  swagger?: string;
  info?: {
    title?: string;
    version?: string;
  };
  servers?: Array<{
    url: string;
    description?: string;
    variables?: Record<string, { default: string; enum?: string[] }>;
  }>;
  paths: Record<string, unknown>;
  components?: Record<string, unknown>;
}

export type ParameterLocation = 'path' | 'query' | 'header' | 'body';

export interface OperationParameter {
  name: string;
  location: ParameterLocation;
  required: boolean;
  schema: JsonSchema;
  description?: string;
}

export interface OperationDescriptor {
  method: HttpMethod;
  path: string;
  operationId?: string;
  parameters: readonly OperationParameter[];
  tags: readonly string[];
  summary?: string;
  description?: string;
  /** Set when the request body is a non-object schema sent as a whole. */
  rawBody?: boolean;
}

// Raw, user-supplied filter strings; each one is a comma-separated list.
export interface FilterOptions {
  methods?: string;
  includePaths?: string;
  excludePaths?: string;
  includeTags?: string;
  excludeTags?: string;
}

export interface FilterConfig {
  methods?: HttpMethod[];
  includePaths?: string[];
  excludePaths?: string[];
  includeTags?: Set<string>;
  excludeTags?: Set<string>;
}

export type FilterPrecedence = 'exclusion-wins' | 'declared-order';

export type RouteOutcome = 'tool' | 'exclude';

// One or more independently compiled expressions; a path matches when any does.
export interface PathPattern {
  readonly source: string;
  readonly alternatives: readonly RegExp[];
}

export interface RoutingRule {
  readonly methods?: ReadonlySet<HttpMethod>;
  readonly pattern?: PathPattern;
  readonly tags?: ReadonlySet<string>;
  readonly outcome: RouteOutcome;
}

export interface ParameterBinding {
  /** Key the caller uses in the tool arguments. */
  argument: string;
  /** Name on the wire (path placeholder, query key, header name or body property). */
  name: string;
  location: ParameterLocation;
  required: boolean;
}

export interface CallTemplate {
  baseUrl: string;
  method: HttpMethod;
  pathTemplate: string;
  parameters: ParameterBinding[];
  rawBody: boolean;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required: string[];
}

export interface ToolBinding {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  operation: OperationDescriptor;
  call: CallTemplate;
}

export interface Classification {
  tools: Map<string, ToolBinding>;
  excluded: OperationDescriptor[];
}

export type AuthScheme =
  | { type: 'none' }
  | { type: 'api_key'; location: 'header'; headerName: string; value: string }
  | { type: 'api_key'; location: 'query'; paramName: string; value: string }
  | { type: 'bearer'; token: string }
  | { type: 'basic'; username: string; password: string };

export type AuthType = AuthScheme['type'];

export interface AuthConfig {
  scheme: AuthScheme;
  customHeaders: Record<string, string>;
}

// Loosely typed auth input as it arrives from the CLI, env or config file.
export interface AuthOptions {
  authType?: string;
  apiKey?: string;
  apiKeyHeader?: string;
  apiKeyLocation?: string;
  apiKeyParamName?: string;
  bearerToken?: string;
  username?: string;
  password?: string;
}

export type RequestAugmentation =
  | { kind: 'none'; headers: Record<string, string> }
  | { kind: 'headers'; headers: Record<string, string> }
  | { kind: 'query'; headers: Record<string, string>; rewriteQuery: (params: URLSearchParams) => void }
  | { kind: 'basic'; headers: Record<string, string>; credentials: { username: string; password: string } };

export interface OutgoingRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

export type ServerType = 'stdio' | 'http' | 'sse';

export interface ServerOptions extends AuthOptions, FilterOptions {
  source: string;
  name?: string;
  host?: string;
  port?: number;
  baseUrl?: string;
  configFile?: string;
  debug?: boolean;
  serverType?: ServerType;
  headers?: string[];
  filterPrecedence?: FilterPrecedence;
  maxToolNameLength?: number;
  timeoutMs?: number;
}

// Shape of the optional JSON config file; CLI options take precedence.
export type ConfigFile = Partial<Omit<ServerOptions, 'source' | 'configFile'>>;

export interface ValidatedServerConfig {
  source: string;
  name: string;
  host: string;
  port: number;
  baseUrl?: string;
  debug: boolean;
  serverType: ServerType;
  auth: AuthConfig;
  filters: FilterOptions;
  filterPrecedence: FilterPrecedence;
  maxToolNameLength: number;
  timeoutMs: number;
}

export type ToolCallResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};
