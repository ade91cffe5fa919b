/**
 * Errors raised while building the tool table. All of them happen at startup,
 * before any tool call is served; the CLI turns them into a non-zero exit.
 */
export class BridgeError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [message]) {
    super(message);
    this.name = new.target.name;
    this.errors = errors;
  }
}

/** Bad filter configuration; carries every problem found in one pass. */
export class ValidationError extends BridgeError {
  constructor(errors: string[]) {
    super(`Filter configuration errors: ${errors.join('; ')}`, errors);
  }
}

export class InvalidPatternError extends BridgeError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid path pattern ${pattern}: ${reason}`);
    this.pattern = pattern;
  }
}

export class MissingCredentialError extends BridgeError {
  readonly missing: string[];

  constructor(authType: string, missing: string[]) {
    super(`${missing.join(', ')} required for ${authType} authentication`);
    this.missing = missing;
  }
}

export class NameCollisionError extends BridgeError {
  readonly toolName: string;

  constructor(toolName: string, first: string, second: string) {
    super(`Tool name collision: "${toolName}" is derived from both ${first} and ${second}`);
    this.toolName = toolName;
  }
}

export class ConfigurationError extends BridgeError {
  constructor(errors: string[]) {
    super(`Configuration errors: ${errors.join('; ')}`, errors);
  }
}

export class DocumentLoadError extends BridgeError {}
