// Base error for every failure raised by the curation run
export class CurationError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'CurationError';
  }
}

// The input dataset file does not exist
export class SourceNotFoundError extends CurationError {
  constructor(public readonly path: string) {
    super(`Source not found: ${path}`, 'SOURCE_NOT_FOUND');
    this.name = 'SourceNotFoundError';
  }
}

// The input could not be decoded or is not a key → record mapping
export class DatasetError extends CurationError {
  constructor(message: string) {
    super(message, 'DATASET_ERROR');
    this.name = 'DatasetError';
  }
}

// Invalid environment or CLI configuration
export class ConfigError extends CurationError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
