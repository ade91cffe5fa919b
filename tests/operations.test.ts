import { describe, test, expect } from '@jest/globals';
import { extractOperations, RefResolver } from '../src/operations';
import { OpenAPIDocument } from '../src/types';
import { loadWidgetsDocument } from './helpers';

describe('extractOperations', () => {
  const operations = extractOperations(loadWidgetsDocument());

  test('lists operations in document order', () => {
    expect(operations.map(op => `${op.method} ${op.path}`)).toEqual([
      'GET /widgets',
      'POST /widgets',
      'GET /widgets/{id}',
      'DELETE /widgets/{id}',
      'PUT /widgets/{id}',
      'GET /internal/metrics'
    ]);
  });

  test('keeps query parameters and skips cookies', () => {
    const [listWidgets] = operations;
    expect(listWidgets.operationId).toBe('listWidgets');
    expect(listWidgets.summary).toBe('List widgets');
    expect(listWidgets.tags).toEqual(['public']);
    expect(listWidgets.parameters).toEqual([
      { name: 'limit', location: 'query', required: false, schema: { type: 'integer' }, description: undefined }
    ]);
  });

  test('turns an object request body into body parameters', () => {
    const createWidget = operations[1];
    expect(createWidget.rawBody).toBe(false);
    expect(createWidget.parameters).toEqual([
      { name: 'name', location: 'body', required: true, schema: { type: 'string' } },
      { name: 'weight', location: 'body', required: false, schema: { type: 'number' } }
    ]);
  });

  test('merges path-level parameters with the operation overriding them', () => {
    const getWidget = operations[2];
    expect(getWidget.parameters).toEqual([
      { name: 'id', location: 'path', required: true, schema: { type: 'string' }, description: undefined },
      { name: 'X-Trace', location: 'header', required: true, schema: { type: 'string' }, description: 'Trace id' }
    ]);
    expect(getWidget.tags).toEqual(['public', 'admin']);

    const deleteWidget = operations[3];
    expect(deleteWidget.description).toBe('Delete a widget');
    expect(deleteWidget.parameters.map(p => `${p.name}:${p.required}`)).toEqual(['id:true', 'X-Trace:false']);
  });

  test('sends a non-object body as a whole', () => {
    const putWidget = operations[4];
    expect(putWidget.rawBody).toBe(true);
    expect(putWidget.tags).toEqual([]);
    expect(putWidget.parameters[2]).toEqual({
      name: 'body',
      location: 'body',
      required: false,
      schema: { type: 'string' },
      description: undefined
    });
  });

  test('returns frozen descriptors', () => {
    expect(operations.every(op => Object.isFrozen(op) && Object.isFrozen(op.tags))).toBe(true);
  });
});

describe('RefResolver', () => {
  test('cuts recursive references', () => {
    const document: OpenAPIDocument = {
      paths: {},
      components: {
        schemas: {
          Node: {
            type: 'object',
            properties: { child: { $ref: '#/components/schemas/Node' } }
          }
        }
      }
    };

    expect(new RefResolver(document).resolve({ $ref: '#/components/schemas/Node' })).toEqual({
      type: 'object',
      properties: { child: {} }
    });
  });

  test('decodes escaped pointer segments', () => {
    const document: OpenAPIDocument = {
      paths: { '/a/b': { get: { summary: 'nested' } } }
    };
    expect(new RefResolver(document).lookup('#/paths/~1a~1b/get')).toEqual({ summary: 'nested' });
  });

  test('resolves unknown and external references to an empty schema', () => {
    const resolver = new RefResolver({ paths: {} });
    expect(resolver.resolve({ $ref: '#/components/schemas/Missing' })).toEqual({});
    expect(resolver.resolve({ $ref: 'other.yaml#/Thing' })).toEqual({});
  });
});
