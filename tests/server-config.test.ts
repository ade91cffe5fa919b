import { describe, test, expect } from '@jest/globals';
import path from 'path';
import { parseConfigFile, ServerConfigManager } from '../src/server-config';
import { Telemetry } from '../src/telemetry';
import { describeRule } from '../src/route-maps';
import { ConfigurationError } from '../src/errors';
import { ServerOptions } from '../src/types';
import { captureError, FIXTURES_DIR } from './helpers';

const CONFIG_FILE = path.join(FIXTURES_DIR, 'config.json');

function manager(options: Partial<ServerOptions> = {}): ServerConfigManager {
  return new ServerConfigManager(
    { source: 'openapi.yaml', ...options },
    new Telemetry({ verbose: false, isStdioMode: false })
  );
}

describe('parseConfigFile', () => {
  test('keeps correctly typed fields and ignores unknown ones', () => {
    expect(parseConfigFile({
      port: 9000,
      debug: true,
      headers: ['X-One: 1'],
      filterPrecedence: 'declared-order',
      serverType: 'sse',
      comment: 'ignored'
    })).toEqual({
      port: 9000,
      debug: true,
      headers: ['X-One: 1'],
      filterPrecedence: 'declared-order',
      serverType: 'sse'
    });
  });

  test('rejects non-finite and non-boolean values', () => {
    const error = captureError(() => parseConfigFile({ port: Infinity, debug: 'yes' }), ConfigurationError);
    expect(error.errors).toEqual([
      'config file field "port" must be a finite number',
      'config file field "debug" must be a boolean'
    ]);
  });
});

describe('ServerConfigManager', () => {
  test('applies defaults', () => {
    const config = manager().initialize();
    expect(config).toMatchObject({
      source: 'openapi.yaml',
      name: 'OpenAPI MCP Server',
      host: '0.0.0.0',
      port: 8000,
      debug: false,
      serverType: 'stdio',
      filterPrecedence: 'exclusion-wins',
      maxToolNameLength: 64,
      timeoutMs: 30000
    });
    expect(config.auth.scheme).toEqual({ type: 'none' });
  });

  test('returns no route rules without filters', () => {
    const configManager = manager();
    configManager.initialize();
    expect(configManager.getRouteRules()).toBeNull();
  });

  test('lets command-line options override the config file', () => {
    const configManager = manager({ configFile: CONFIG_FILE, port: 9100, headers: ['X-Cli: 2'] });
    const config = configManager.initialize();

    expect(config.name).toBe('Widget Tools');
    expect(config.port).toBe(9100);
    expect(configManager.getAuthConfig().customHeaders).toEqual({ 'X-From-File': '1', 'X-Cli': '2' });
    expect(configManager.getRouteRules()?.map(describeRule)).toEqual([
      'EXCLUDE(methods=POST)',
      'EXCLUDE(methods=PUT)',
      'EXCLUDE(methods=PATCH)',
      'EXCLUDE(methods=DELETE)',
      'EXCLUDE(methods=HEAD)',
      'EXCLUDE(methods=OPTIONS)',
      'TOOL(methods=GET)',
      'EXCLUDE(*)'
    ]);
  });

  test('reports a missing config file', () => {
    const error = captureError(() => manager({ configFile: 'nope.json' }).initialize(), ConfigurationError);
    expect(error.message).toBe('Configuration errors: Config file not found: nope.json');
  });

  test('reports every wrongly typed config file field', () => {
    const error = captureError(
      () => manager({ configFile: path.join(FIXTURES_DIR, 'bad-config.json') }).initialize(),
      ConfigurationError
    );
    expect(error.errors).toEqual([
      'config file field "name" must be a string',
      'config file field "methods" must be a string',
      'config file field "timeoutMs" must be a finite number',
      'config file field "headers" must be an array of strings',
      'config file field "serverType" must be one of stdio, http, sse'
    ]);
  });

  test('rejects a config file that is not a JSON object', () => {
    const configFile = path.join(FIXTURES_DIR, 'array-config.json');
    const error = captureError(() => manager({ configFile }).initialize(), ConfigurationError);
    expect(error.errors).toEqual([`Could not load config file ${configFile}: expected a JSON object`]);
  });

  test('rejects a timeout that is not a finite number', () => {
    const error = captureError(() => manager({ timeoutMs: Number.NaN }).initialize(), ConfigurationError);
    expect(error.errors).toEqual(['timeout must be between 1000ms and 300000ms']);
  });

  test('collects every invalid general setting', () => {
    const error = captureError(
      () => manager({ port: 70000, maxToolNameLength: 4, timeoutMs: 10 }).initialize(),
      ConfigurationError
    );
    expect(error.errors).toEqual([
      'port must be an integer between 0 and 65535',
      'maxToolNameLength must be an integer of at least 8',
      'timeout must be between 1000ms and 300000ms'
    ]);
  });

  test('warns about malformed custom headers and drops them', () => {
    const configManager = manager({ headers: ['broken', 'X-Env: test'] });
    configManager.initialize();

    expect(console.warn).toHaveBeenCalledWith('[WARN] ⚠️  Invalid header format: broken');
    expect(configManager.getAuthConfig().customHeaders).toEqual({ 'X-Env': 'test' });
  });

  test('refuses to hand out configuration before initialization', () => {
    expect(() => manager().getValidatedConfig()).toThrow('Configuration has not been initialized');
  });
});
