import type { AppConfig } from '../types/config.types.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

// Cosine distance distributions, and so the cutoff constants, are tuned against
// this model. Switching it requires re-validating the ranker.
export const DEFAULT_MODEL = 'Xenova/paraphrase-multilingual-MiniLM-L12-v2';

export const DEFAULT_CONFIG: AppConfig = {
  encoder: {
    provider: 'transformers',
    model: DEFAULT_MODEL,
    ollamaBaseUrl: 'http://localhost:11434',
    batchSize: 32,
  },
  index: {
    store: 'sqlite',
    persistPath: join(homedir(), '.listing-search', 'index.db'),
  },
  api: {
    socketPath: '/tmp/listing-search.sock',
    host: '127.0.0.1',
    port: 3777,
    token: 'dev-token-change-me',
  },
  logLevel: 'info',
};
