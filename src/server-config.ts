import fs from 'fs';
import path from 'path';
import {
  AuthConfig,
  ConfigFile,
  FilterOptions,
  FilterPrecedence,
  RoutingRule,
  ServerOptions,
  ServerType,
  ValidatedServerConfig
} from './types.js';
import { Telemetry } from './telemetry.js';
import { parseCustomHeaders, resolveAuthConfig } from './auth.js';
import { hasAnyFilter, parseFilterConfig } from './filter-validator.js';
import { createRouteMapsFromFilters, describeRule } from './route-maps.js';
import { DEFAULT_MAX_TOOL_NAME_LENGTH } from './classifier.js';
import { DEFAULT_TIMEOUT_MS } from './openapi-loader.js';
import { ConfigurationError } from './errors.js';

export const DEFAULTS: Readonly<{
  name: string;
  host: string;
  port: number;
  serverType: ServerType;
  filterPrecedence: FilterPrecedence;
}> = {
  name: 'OpenAPI MCP Server',
  host: '0.0.0.0',
  port: 8000,
  serverType: 'stdio',
  filterPrecedence: 'exclusion-wins'
};

const SERVER_TYPES: readonly ServerType[] = ['stdio', 'http', 'sse'];
const PRECEDENCES: readonly FilterPrecedence[] = ['exclusion-wins', 'declared-order'];

const STRING_FIELDS = [
  'name',
  'host',
  'baseUrl',
  'authType',
  'apiKey',
  'apiKeyHeader',
  'apiKeyLocation',
  'apiKeyParamName',
  'bearerToken',
  'username',
  'password',
  'methods',
  'includePaths',
  'excludePaths',
  'includeTags',
  'excludeTags'
] as const;

const NUMBER_FIELDS = ['port', 'maxToolNameLength', 'timeoutMs'] as const;

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isServerType(value: unknown): value is ServerType {
  return SERVER_TYPES.some(type => type === value);
}

function isFilterPrecedence(value: unknown): value is FilterPrecedence {
  return PRECEDENCES.some(precedence => precedence === value);
}

/**
 * Reads the fields of a parsed config file, checking the JSON type of each.
 * Unknown fields are ignored; every wrongly typed field is reported at once.
 */
export function parseConfigFile(raw: Record<string, unknown>): ConfigFile {
  const config: ConfigFile = {};
  const errors: string[] = [];
  const reject = (field: string, expected: string): void => {
    errors.push(`config file field "${field}" must be ${expected}`);
  };

  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === 'string') {
      config[field] = value;
    } else {
      reject(field, 'a string');
    }
  }

  for (const field of NUMBER_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === 'number' && Number.isFinite(value)) {
      config[field] = value;
    } else {
      reject(field, 'a finite number');
    }
  }

  const debug = raw.debug;
  if (debug !== undefined) {
    if (typeof debug === 'boolean') {
      config.debug = debug;
    } else {
      reject('debug', 'a boolean');
    }
  }

  const headers = raw.headers;
  if (headers !== undefined) {
    if (isStringArray(headers)) {
      config.headers = headers;
    } else {
      reject('headers', 'an array of strings');
    }
  }

  const serverType = raw.serverType;
  if (serverType !== undefined) {
    if (isServerType(serverType)) {
      config.serverType = serverType;
    } else {
      reject('serverType', `one of ${SERVER_TYPES.join(', ')}`);
    }
  }

  const filterPrecedence = raw.filterPrecedence;
  if (filterPrecedence !== undefined) {
    if (isFilterPrecedence(filterPrecedence)) {
      config.filterPrecedence = filterPrecedence;
    } else {
      reject('filterPrecedence', `one of ${PRECEDENCES.join(', ')}`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}

export class ServerConfigManager {
  private fileConfig: ConfigFile = {};
  private validatedConfig?: ValidatedServerConfig;
  private routeRules: RoutingRule[] | null = null;
  private options: ServerOptions;
  private telemetry: Telemetry;

  constructor(options: ServerOptions, telemetry: Telemetry) {
    this.options = options;
    this.telemetry = telemetry;
  }

  /**
   * Loads the optional config file, merges it under the CLI options and
   * validates everything. Throws before anything is served.
   */
  initialize(): ValidatedServerConfig {
    this.loadConfigFile();
    const merged = this.mergeOptions();
    this.validateGeneralSettings(merged);

    const auth = this.buildAuthConfig(merged);
    const filters = this.pickFilters(merged);
    const filterPrecedence = merged.filterPrecedence ?? DEFAULTS.filterPrecedence;

    // No filter at all means no route map: every operation becomes a tool
    this.routeRules = hasAnyFilter(filters)
      ? createRouteMapsFromFilters(parseFilterConfig(filters), filterPrecedence)
      : null;

    this.validatedConfig = {
      source: merged.source,
      name: merged.name ?? DEFAULTS.name,
      host: merged.host ?? DEFAULTS.host,
      port: merged.port ?? DEFAULTS.port,
      baseUrl: merged.baseUrl,
      debug: merged.debug ?? false,
      serverType: merged.serverType ?? DEFAULTS.serverType,
      auth,
      filters,
      filterPrecedence,
      maxToolNameLength: merged.maxToolNameLength ?? DEFAULT_MAX_TOOL_NAME_LENGTH,
      timeoutMs: merged.timeoutMs ?? DEFAULT_TIMEOUT_MS
    };

    this.telemetry.debug(`🔐 Authentication: ${auth.scheme.type}`);
    if (this.routeRules) {
      this.telemetry.debug(`🧭 Route map (${filterPrecedence}): ${this.routeRules.map(describeRule).join(', ')}`);
    }
    return this.validatedConfig;
  }

  getValidatedConfig(): ValidatedServerConfig {
    if (!this.validatedConfig) {
      throw new Error('Configuration has not been initialized');
    }
    return this.validatedConfig;
  }

  getRouteRules(): RoutingRule[] | null {
    return this.routeRules;
  }

  getAuthConfig(): AuthConfig {
    return this.getValidatedConfig().auth;
  }

  private loadConfigFile(): void {
    if (!this.options.configFile) {
      return;
    }

    const configPath = path.resolve(this.options.configFile);
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError([`Config file not found: ${this.options.configFile}`]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError([`Could not load config file ${this.options.configFile}: ${(error as Error).message}`]);
    }
    if (!isJsonObject(parsed)) {
      throw new ConfigurationError([`Could not load config file ${this.options.configFile}: expected a JSON object`]);
    }
    this.fileConfig = parseConfigFile(parsed);
    this.telemetry.debug(`📄 Loaded config from ${this.options.configFile}`);
  }

  // CLI (and env through the CLI) takes precedence over the config file
  private mergeOptions(): ServerOptions {
    const merged: ServerOptions = { ...this.fileConfig, source: this.options.source };
    for (const [key, value] of Object.entries(this.options)) {
      if (value !== undefined) {
        Reflect.set(merged, key, value);
      }
    }
    if (this.fileConfig.headers && this.options.headers) {
      merged.headers = [...this.fileConfig.headers, ...this.options.headers];
    }
    return merged;
  }

  private validateGeneralSettings(options: ServerOptions): void {
    const errors: string[] = [];

    if (options.serverType !== undefined && !SERVER_TYPES.includes(options.serverType)) {
      errors.push(`Invalid server type: ${options.serverType}. Must be one of ${SERVER_TYPES.join(', ')}`);
    }
    if (options.filterPrecedence !== undefined && !PRECEDENCES.includes(options.filterPrecedence)) {
      errors.push(`Invalid filter precedence: ${options.filterPrecedence}. Must be one of ${PRECEDENCES.join(', ')}`);
    }
    if (options.port !== undefined && (!Number.isInteger(options.port) || options.port < 0 || options.port > 65535)) {
      errors.push('port must be an integer between 0 and 65535');
    }
    if (options.maxToolNameLength !== undefined && (!Number.isInteger(options.maxToolNameLength) || options.maxToolNameLength < 8)) {
      errors.push('maxToolNameLength must be an integer of at least 8');
    }
    if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 1000 || options.timeoutMs > 300000)) {
      errors.push('timeout must be between 1000ms and 300000ms');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
  }

  private buildAuthConfig(options: ServerOptions): AuthConfig {
    const { headers, warnings } = parseCustomHeaders(options.headers);
    for (const warning of warnings) {
      this.telemetry.warn(`⚠️  ${warning}`);
    }
    return resolveAuthConfig(options, headers);
  }

  private pickFilters(options: ServerOptions): FilterOptions {
    return {
      methods: options.methods,
      includePaths: options.includePaths,
      excludePaths: options.excludePaths,
      includeTags: options.includeTags,
      excludeTags: options.excludeTags
    };
  }
}
