import type { AppConfig } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function validateConfig(config: AppConfig): void {
  if (!config.api.token || config.api.token.trim() === '') {
    throw new ConfigValidationError(
      'api.token must not be empty. Set LISTING_SEARCH_TOKEN env var or provide in config.',
    );
  }

  if (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65535) {
    throw new ConfigValidationError(
      `API port must be between 1 and 65535, got ${config.api.port}.`,
    );
  }

  if (!config.encoder.model || config.encoder.model.trim() === '') {
    throw new ConfigValidationError('encoder.model must not be empty.');
  }

  if (config.encoder.provider === 'ollama') {
    if (!config.encoder.ollamaBaseUrl || config.encoder.ollamaBaseUrl.trim() === '') {
      throw new ConfigValidationError('Encoder provider "ollama" requires ollamaBaseUrl.');
    }
  }

  if (!Number.isInteger(config.encoder.batchSize) || config.encoder.batchSize < 1) {
    throw new ConfigValidationError('encoder.batchSize must be an integer >= 1.');
  }

  if (config.index.store === 'sqlite') {
    if (!config.index.persistPath || config.index.persistPath.trim() === '') {
      throw new ConfigValidationError('Index store "sqlite" requires persistPath.');
    }
  }
}
