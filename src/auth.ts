import { AuthConfig, AuthOptions, AuthScheme, AuthType, OutgoingRequest, RequestAugmentation } from './types.js';
import { ConfigurationError, MissingCredentialError } from './errors.js';

export const DEFAULT_API_KEY_HEADER = 'X-API-Key';
export const DEFAULT_API_KEY_PARAM_NAME = 'key';

const AUTH_TYPES = ['none', 'api_key', 'bearer', 'basic'] as const;

const REQUIRED_CREDENTIALS: Record<string, Array<keyof AuthOptions>> = {
  api_key: ['apiKey'],
  bearer: ['bearerToken'],
  basic: ['username', 'password']
};

const OPTION_LABELS: Partial<Record<keyof AuthOptions, string>> = {
  apiKey: 'api_key',
  bearerToken: 'bearer_token',
  username: 'username',
  password: 'password'
};

export interface HeaderParseResult {
  headers: Record<string, string>;
  warnings: string[];
}

/**
 * Parses "Name: Value" strings. Entries without a colon are dropped and
 * reported as warnings; only the first colon splits, so values may contain
 * colons themselves.
 */
export function parseCustomHeaders(entries: readonly string[] = []): HeaderParseResult {
  const headers: Record<string, string> = {};
  const warnings: string[] = [];

  for (const entry of entries) {
    const separator = entry.indexOf(':');
    if (separator === -1) {
      warnings.push(`Invalid header format: ${entry}`);
      continue;
    }
    const name = entry.substring(0, separator).trim();
    if (!name) {
      warnings.push(`Invalid header format: ${entry}`);
      continue;
    }
    headers[name] = entry.substring(separator + 1).trim();
  }

  return { headers, warnings };
}

/**
 * Builds the closed auth configuration from loose options. Missing credentials
 * for the selected type raise MissingCredentialError; a key location or
 * parameter name that does not fit the type raises ConfigurationError.
 */
export function resolveAuthConfig(options: AuthOptions, customHeaders: Record<string, string> = {}): AuthConfig {
  const authType = options.authType ?? 'none';
  if (!isAuthType(authType)) {
    throw new ConfigurationError([`Invalid authentication type: ${authType}. Must be one of ${AUTH_TYPES.join(', ')}`]);
  }

  const missing = (REQUIRED_CREDENTIALS[authType] ?? []).filter(option => !options[option]);
  if (missing.length > 0) {
    throw new MissingCredentialError(authType, missing.map(option => OPTION_LABELS[option] ?? option));
  }

  const location = options.apiKeyLocation ?? 'header';
  const errors: string[] = [];
  if (authType !== 'api_key' && location !== 'header') {
    errors.push('--api-key-location is only valid when --auth-type api_key');
  }
  if (authType === 'api_key' && location !== 'header' && location !== 'query') {
    errors.push("--api-key-location must be either 'header' or 'query'");
  }
  if (authType === 'api_key' && location === 'query' && options.apiKeyParamName === '') {
    errors.push('--api-key-param-name must be provided when --api-key-location query is used');
  }
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return Object.freeze({
    scheme: Object.freeze(buildScheme(authType, options)),
    customHeaders: Object.freeze({ ...customHeaders })
  });
}

function buildScheme(authType: AuthType, options: AuthOptions): AuthScheme {
  switch (authType) {
    case 'none':
      return { type: 'none' };
    case 'api_key':
      return options.apiKeyLocation === 'query'
        ? { type: 'api_key', location: 'query', paramName: options.apiKeyParamName || DEFAULT_API_KEY_PARAM_NAME, value: options.apiKey ?? '' }
        : { type: 'api_key', location: 'header', headerName: options.apiKeyHeader || DEFAULT_API_KEY_HEADER, value: options.apiKey ?? '' };
    case 'bearer':
      return { type: 'bearer', token: options.bearerToken ?? '' };
    case 'basic':
      return { type: 'basic', username: options.username ?? '', password: options.password ?? '' };
  }
}

function isAuthType(value: string): value is AuthType {
  return AUTH_TYPES.some(type => type === value);
}

/**
 * Computes the augmentation shared by every outgoing call. The auth scheme
 * contributes first; custom headers are merged on top and win on a clash.
 */
export function buildRequestAugmentation(config: AuthConfig): RequestAugmentation {
  const { scheme, customHeaders } = config;

  switch (scheme.type) {
    case 'none':
      return { kind: 'none', headers: { ...customHeaders } };
    case 'bearer':
      return { kind: 'headers', headers: mergeHeaders({ Authorization: `Bearer ${scheme.token}` }, customHeaders) };
    case 'basic':
      return {
        kind: 'basic',
        headers: { ...customHeaders },
        credentials: { username: scheme.username, password: scheme.password }
      };
    case 'api_key':
      if (scheme.location === 'header') {
        return { kind: 'headers', headers: mergeHeaders({ [scheme.headerName]: scheme.value }, customHeaders) };
      }
      return {
        kind: 'query',
        headers: { ...customHeaders },
        // set() replaces any value the caller passed under the same name
        rewriteQuery: params => params.set(scheme.paramName, scheme.value)
      };
  }
}

/**
 * Applies the augmentation to a request about to be sent. Returns a new
 * request; the input is not modified.
 */
export function applyRequestAugmentation(augmentation: RequestAugmentation, request: OutgoingRequest): OutgoingRequest {
  const url = new URL(request.url.toString());
  let headers: Record<string, string> = { ...request.headers };

  if (augmentation.kind === 'basic') {
    const { username, password } = augmentation.credentials;
    headers = mergeHeaders(headers, {
      Authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
    });
  }

  headers = mergeHeaders(headers, augmentation.headers);

  if (augmentation.kind === 'query') {
    augmentation.rewriteQuery(url.searchParams);
  }

  return { ...request, url, headers };
}

/** Header names are case-insensitive; an override replaces any spelling of its name. */
export function mergeHeaders(base: Record<string, string>, overrides: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = { ...base };
  for (const [name, value] of Object.entries(overrides)) {
    for (const existing of Object.keys(merged)) {
      if (existing.toLowerCase() === name.toLowerCase()) {
        delete merged[existing];
      }
    }
    merged[name] = value;
  }
  return merged;
}
