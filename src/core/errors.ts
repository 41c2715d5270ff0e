import type { SourceName } from './types';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SourceReadError extends Error {
  public readonly source: SourceName;

  constructor(source: SourceName, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = 'SourceReadError';
    this.source = source;
  }
}
