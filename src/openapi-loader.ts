import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { OpenAPIDocument } from './types.js';
import { ConfigurationError, DocumentLoadError } from './errors.js';

export const DEFAULT_TIMEOUT_MS = 30000;

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Loads an OpenAPI document from a file path or an http(s) URL. Content is
 * decoded as JSON first and as YAML when that fails.
 */
export async function loadOpenAPIDocument(source: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<OpenAPIDocument> {
  const content = isUrl(source) ? await fetchDocument(source, timeoutMs) : readDocument(source);
  return parseOpenAPIDocument(content, source);
}

async function fetchDocument(url: string, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new DocumentLoadError(`Could not fetch OpenAPI document from ${url}: ${(error as Error).message}`);
  }
  if (!response.ok) {
    throw new DocumentLoadError(`Could not fetch OpenAPI document from ${url}: HTTP ${response.status}`);
  }
  return response.text();
}

function readDocument(file: string): string {
  const filePath = path.resolve(file);
  if (!fs.existsSync(filePath)) {
    throw new DocumentLoadError(`File not found: ${file}`);
  }
  return fs.readFileSync(filePath, 'utf8');
}

export function parseOpenAPIDocument(content: string, source = 'document'): OpenAPIDocument {
  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch {
    try {
      decoded = yaml.load(content);
    } catch (error) {
      throw new DocumentLoadError(`Could not parse ${source} as JSON or YAML: ${(error as Error).message}`);
    }
  }

  if (!isOpenAPIDocument(decoded)) {
    throw new DocumentLoadError(`${source} is not an OpenAPI document: missing "paths" object`);
  }
  return decoded;
}

function isOpenAPIDocument(value: unknown): value is OpenAPIDocument {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const paths: unknown = Reflect.get(value, 'paths');
  return typeof paths === 'object' && paths !== null && !Array.isArray(paths);
}

/**
 * The --base-url override wins; otherwise the first server entry, with its
 * `{variable}` placeholders replaced by their declared defaults. A relative
 * server URL is resolved against the URL the document came from.
 */
export function resolveBaseUrl(document: OpenAPIDocument, override?: string, source?: string): string {
  const server = document.servers?.[0];
  const candidate = override || server?.url;
  if (!candidate) {
    throw new ConfigurationError([
      'No base URL: pass --base-url or declare a server in the OpenAPI document'
    ]);
  }

  let url = candidate;
  if (!override && server?.variables) {
    for (const [name, variable] of Object.entries(server.variables)) {
      url = url.split(`{${name}}`).join(variable.default);
    }
  }

  if (!isUrl(url)) {
    if (!source || !isUrl(source)) {
      throw new ConfigurationError([
        `Server URL ${url} is relative: pass --base-url or load the document from a URL`
      ]);
    }
    url = new URL(url, source).toString();
  }
  return url.replace(/\/+$/, '');
}
