import { OutgoingRequest, RequestAugmentation, ToolBinding, ToolCallResult } from './types.js';
import { applyRequestAugmentation } from './auth.js';
import { DEFAULT_TIMEOUT_MS } from './openapi-loader.js';
import { Telemetry } from './telemetry.js';

export type ToolArguments = Record<string, unknown>;

export class ArgumentError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required arguments: ${missing.join(', ')}`);
    this.name = 'ArgumentError';
  }
}

function toText(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Materializes the HTTP request for one tool call from the binding's call
 * template. Arguments that match no parameter are ignored.
 */
export function buildRequest(binding: ToolBinding, args: ToolArguments): OutgoingRequest {
  const { call } = binding;

  const missing = call.parameters
    .filter(parameter => parameter.required && (args[parameter.argument] === undefined || args[parameter.argument] === null))
    .map(parameter => parameter.argument);
  if (missing.length > 0) {
    throw new ArgumentError(missing);
  }

  let path = call.pathTemplate;
  const query = new URLSearchParams();
  const headers: Record<string, string> = { Accept: 'application/json' };
  const bodyFields: Record<string, unknown> = {};
  let rawBody: unknown;

  for (const parameter of call.parameters) {
    const value = args[parameter.argument];
    if (value === undefined || value === null) {
      continue;
    }

    switch (parameter.location) {
      case 'path':
        path = path.split(`{${parameter.name}}`).join(encodeURIComponent(toText(value)));
        break;
      case 'query':
        if (Array.isArray(value)) {
          value.forEach(item => query.append(parameter.name, toText(item)));
        } else {
          query.append(parameter.name, toText(value));
        }
        break;
      case 'header':
        headers[parameter.name] = toText(value);
        break;
      case 'body':
        if (call.rawBody) {
          rawBody = value;
        } else {
          bodyFields[parameter.name] = value;
        }
        break;
    }
  }

  const url = new URL(`${call.baseUrl}${path}`);
  query.forEach((value, key) => url.searchParams.append(key, value));

  const request: OutgoingRequest = { method: call.method, url, headers };
  const body = call.rawBody ? rawBody : Object.keys(bodyFields).length > 0 ? bodyFields : undefined;
  if (body !== undefined) {
    request.body = JSON.stringify(body);
    request.headers['Content-Type'] = 'application/json';
  }
  return request;
}

/**
 * Sends tool calls to the remote API. Every call gets the shared request
 * augmentation and its own timeout; there are no retries.
 */
export class ApiClient {
  constructor(
    private augmentation: RequestAugmentation,
    private telemetry: Telemetry,
    private timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {}

  async execute(binding: ToolBinding, args: ToolArguments): Promise<ToolCallResult> {
    let request: OutgoingRequest;
    try {
      request = applyRequestAugmentation(this.augmentation, buildRequest(binding, args));
    } catch (error) {
      if (error instanceof ArgumentError) {
        return this.failure({
          error: 'INVALID_ARGUMENTS',
          message: error.message,
          tool: binding.name
        });
      }
      throw error;
    }

    // Query strings may carry credentials
    const displayUrl = `${request.url.origin}${request.url.pathname}`;
    this.telemetry.debug(`Tool execution: ${request.method} ${displayUrl}`);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        return this.httpFailure(binding.name, response, displayUrl);
      }

      const text = await response.text();
      return {
        content: [{
          type: 'text',
          text: text ? formatBody(text) : JSON.stringify({ status: response.status }, null, 2)
        }]
      };
    } catch (error) {
      this.telemetry.error(`❌ Tool execution failed for ${binding.name}: ${(error as Error).message}`);
      return this.failure({
        error: 'EXECUTION_FAILED',
        message: `Failed to execute tool ${binding.name}`,
        details: (error as Error).message,
        tool: binding.name
      });
    }
  }

  private async httpFailure(toolName: string, response: Response, url: string): Promise<ToolCallResult> {
    if (response.status === 401 || response.status === 403) {
      this.telemetry.warn(`🔒 ${response.status} security error for tool ${toolName} - ${response.statusText}`);
    }

    if (response.status === 401) {
      return this.failure({
        error: 'AUTHENTICATION_REQUIRED',
        message: 'The API rejected the configured credentials',
        suggestion: 'Check the authentication options the server was started with',
        status: 401,
        tool: toolName
      });
    }

    if (response.status === 403) {
      return this.failure({
        error: 'INSUFFICIENT_PERMISSIONS',
        message: 'Access denied for this operation',
        status: 403,
        tool: toolName
      });
    }

    const text = await response.text();
    let details: unknown = response.statusText;
    if (text) {
      try {
        details = JSON.parse(text);
      } catch {
        details = text;
      }
    }

    return this.failure({
      error: 'HTTP_ERROR',
      message: `HTTP ${response.status}: ${response.statusText}`,
      status: response.status,
      tool: toolName,
      url,
      details
    });
  }

  private failure(payload: Record<string, unknown>): ToolCallResult {
    return {
      content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
      isError: true
    };
  }
}

function formatBody(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}
