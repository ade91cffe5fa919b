import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { createProgram, formatStartupError } from '../src/program';
import { ConfigurationError, ValidationError } from '../src/errors';
import { ServerOptions } from '../src/types';

function setup() {
  const start = jest.fn<(options: ServerOptions) => Promise<void>>().mockResolvedValue(undefined);
  const program = createProgram(start)
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
  return { start, program };
}

describe('createProgram', () => {
  afterEach(() => {
    delete process.env.API_KEY;
    delete process.env.SERVER_TYPE;
  });

  test('maps command-line options onto server options', async () => {
    const { start, program } = setup();
    await program.parseAsync([
      'openapi.yaml',
      '--methods', 'GET,POST',
      '--exclude-tags', 'internal',
      '--port', '9000',
      '--header', 'X-One: 1',
      '--header', 'X-Two: 2',
      '--filter-precedence', 'declared-order',
      '--max-tool-name-length', '40'
    ], { from: 'user' });

    expect(start).toHaveBeenCalledTimes(1);
    expect(start).toHaveBeenCalledWith(expect.objectContaining({
      source: 'openapi.yaml',
      methods: 'GET,POST',
      excludeTags: 'internal',
      port: 9000,
      headers: ['X-One: 1', 'X-Two: 2'],
      filterPrecedence: 'declared-order',
      maxToolNameLength: 40
    }));
  });

  test('leaves unset options undefined so the config file can supply them', async () => {
    const { start, program } = setup();
    await program.parseAsync(['openapi.yaml'], { from: 'user' });

    expect(start).toHaveBeenCalledWith(expect.objectContaining({
      source: 'openapi.yaml',
      port: undefined,
      host: undefined,
      serverType: undefined,
      filterPrecedence: undefined
    }));
  });

  test('reads credentials and the transport from the environment', async () => {
    process.env.API_KEY = 'test-key';
    process.env.SERVER_TYPE = 'http';
    const { start, program } = setup();
    await program.parseAsync(['openapi.yaml', '--auth-type', 'api_key'], { from: 'user' });

    expect(start).toHaveBeenCalledWith(expect.objectContaining({
      authType: 'api_key',
      apiKey: 'test-key',
      serverType: 'http'
    }));
  });

  test('accepts the sse transport from the command line and the environment', async () => {
    const fromFlag = setup();
    await fromFlag.program.parseAsync(['openapi.yaml', '-t', 'sse'], { from: 'user' });
    expect(fromFlag.start).toHaveBeenCalledWith(expect.objectContaining({ serverType: 'sse' }));

    process.env.SERVER_TYPE = 'sse';
    const fromEnv = setup();
    await fromEnv.program.parseAsync(['openapi.yaml'], { from: 'user' });
    expect(fromEnv.start).toHaveBeenCalledWith(expect.objectContaining({ serverType: 'sse' }));
  });

  test('rejects an unknown transport', async () => {
    const { start, program } = setup();
    await expect(program.parseAsync(['openapi.yaml', '--server-type', 'websocket'], { from: 'user' })).rejects.toThrow();
    expect(start).not.toHaveBeenCalled();
  });

  test('rejects values outside the allowed choices', async () => {
    const { start, program } = setup();
    await expect(program.parseAsync(['openapi.yaml', '--auth-type', 'oauth'], { from: 'user' })).rejects.toThrow();
    expect(start).not.toHaveBeenCalled();
  });

  test('rejects a non-numeric port', async () => {
    const { start, program } = setup();
    await expect(program.parseAsync(['openapi.yaml', '--port', 'eighty'], { from: 'user' })).rejects.toThrow();
    expect(start).not.toHaveBeenCalled();
  });
});

describe('formatStartupError', () => {
  test('prints one line per filter error', () => {
    expect(formatStartupError(new ValidationError(['Invalid include path pattern: (', 'Invalid exclude path pattern: [']))).toEqual([
      '❌ Filter error: Invalid include path pattern: (',
      '❌ Filter error: Invalid exclude path pattern: ['
    ]);
  });

  test('prints configuration problems', () => {
    expect(formatStartupError(new ConfigurationError(['port must be an integer between 0 and 65535']))).toEqual([
      '❌ Error: port must be an integer between 0 and 65535'
    ]);
  });

  test('falls back to the error message', () => {
    expect(formatStartupError(new Error('boom'))).toEqual(['❌ Failed to start server: boom']);
  });
});
