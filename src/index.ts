export { OpenAPIToolServer } from './server.js';
export * from './types.js';
export * from './errors.js';
export { compilePattern, combinePatterns, matchesPath } from './pattern-filter.js';
export { validateFilterOptions, parseFilterConfig, parseCommaSeparated } from './filter-validator.js';
export { createRouteMapsFromFilters } from './route-maps.js';
export { classifyOperations, deriveToolName, resolveOutcome } from './classifier.js';
export {
  resolveAuthConfig,
  buildRequestAugmentation,
  applyRequestAugmentation,
  parseCustomHeaders
} from './auth.js';
export { extractOperations } from './operations.js';
export { loadOpenAPIDocument, parseOpenAPIDocument, resolveBaseUrl } from './openapi-loader.js';

// Simple programmatic interface
import { OpenAPIToolServer } from './server.js';
import { ServerOptions } from './types.js';

export function createToolServer(options: ServerOptions): OpenAPIToolServer {
  return new OpenAPIToolServer(options);
}

export async function startServer(options: ServerOptions): Promise<OpenAPIToolServer> {
  const server = new OpenAPIToolServer(options);
  await server.run();
  return server;
}
