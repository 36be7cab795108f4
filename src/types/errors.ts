// src/types/errors.ts

export class HarvesterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HarvesterError';
  }
}

/**
 * Bad or missing argument, path or config value. Always fatal.
 */
export class ConfigurationError extends HarvesterError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * One XML file could not be turned into a record. Recovered per file.
 */
export class ParseError extends HarvesterError {
  readonly filePath: string;
  readonly reason: string;

  constructor(filePath: string, reason: string) {
    super(`${filePath}: ${reason}`);
    this.name = 'ParseError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

/**
 * Browser or mirroring tool missing, or the source page no longer looks the
 * way the downloader expects.
 */
export class ExternalToolError extends HarvesterError {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super(message);
    this.name = 'ExternalToolError';
    this.tool = tool;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
