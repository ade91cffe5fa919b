import { describe, test, expect, beforeAll, afterAll, afterEach } from '@jest/globals';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { loadOpenAPIDocument, parseOpenAPIDocument, resolveBaseUrl } from '../src/openapi-loader';
import { ConfigurationError, DocumentLoadError } from '../src/errors';
import { captureError, captureRejection, WIDGETS_SPEC } from './helpers';

const server = setupServer();

describe('loadOpenAPIDocument', () => {
  beforeAll(() => {
    server.listen({ onUnhandledRequest: 'error' });
  });

  afterEach(() => {
    server.resetHandlers();
  });

  afterAll(() => {
    server.close();
  });

  test('reads a YAML file', async () => {
    const document = await loadOpenAPIDocument(WIDGETS_SPEC);
    expect(document.info?.title).toBe('Widget API');
    expect(Object.keys(document.paths)).toEqual(['/widgets', '/widgets/{id}', '/internal/metrics']);
  });

  test('reports a missing file', async () => {
    const error = await captureRejection(loadOpenAPIDocument('tests/fixtures/missing.yaml'), DocumentLoadError);
    expect(error.message).toBe('File not found: tests/fixtures/missing.yaml');
  });

  test('fetches a document from a URL', async () => {
    server.use(
      http.get('https://specs.example.com/openapi.json', () =>
        HttpResponse.json({ openapi: '3.0.0', info: { title: 'Remote', version: '1' }, paths: {} }))
    );

    const document = await loadOpenAPIDocument('https://specs.example.com/openapi.json');
    expect(document.info?.title).toBe('Remote');
  });

  test('reports a failed fetch', async () => {
    server.use(
      http.get('https://specs.example.com/missing.json', () => new HttpResponse(null, { status: 404 }))
    );

    const error = await captureRejection(loadOpenAPIDocument('https://specs.example.com/missing.json'), DocumentLoadError);
    expect(error.message).toBe('Could not fetch OpenAPI document from https://specs.example.com/missing.json: HTTP 404');
  });
});

describe('parseOpenAPIDocument', () => {
  test('parses JSON and YAML', () => {
    expect(parseOpenAPIDocument('{"paths": {"/a": {}}}').paths).toEqual({ '/a': {} });
    expect(parseOpenAPIDocument('paths:\n  /b: {}\n').paths).toEqual({ '/b': {} });
  });

  test('requires a paths object', () => {
    const error = captureError(() => parseOpenAPIDocument('{"openapi": "3.0.0"}', 'api.json'), DocumentLoadError);
    expect(error.message).toBe('api.json is not an OpenAPI document: missing "paths" object');
  });
});

describe('resolveBaseUrl', () => {
  test('substitutes server variables and strips trailing slashes', () => {
    const document = parseOpenAPIDocument(
      '{"paths": {}, "servers": [{"url": "https://{region}.api.example.com/v1/", "variables": {"region": {"default": "eu"}}}]}'
    );
    expect(resolveBaseUrl(document)).toBe('https://eu.api.example.com/v1');
  });

  test('prefers the override', () => {
    const document = parseOpenAPIDocument('{"paths": {}, "servers": [{"url": "https://api.example.com"}]}');
    expect(resolveBaseUrl(document, 'https://staging.example.com/')).toBe('https://staging.example.com');
  });

  test('resolves a relative server against the document URL', () => {
    const document = parseOpenAPIDocument('{"paths": {}, "servers": [{"url": "/api"}]}');
    expect(resolveBaseUrl(document, undefined, 'https://specs.example.com/docs/openapi.json')).toBe('https://specs.example.com/api');
  });

  test('fails without any usable URL', () => {
    const document = parseOpenAPIDocument('{"paths": {}}');
    expect(() => resolveBaseUrl(document)).toThrow(ConfigurationError);

    const relative = parseOpenAPIDocument('{"paths": {}, "servers": [{"url": "/api"}]}');
    const error = captureError(() => resolveBaseUrl(relative, undefined, 'openapi.yaml'), ConfigurationError);
    expect(error.errors).toEqual(['Server URL /api is relative: pass --base-url or load the document from a URL']);
  });
});
