export type EncoderProvider = 'transformers' | 'ollama';

export interface EncoderConfig {
  provider: EncoderProvider;
  model: string;
  ollamaBaseUrl?: string;
  /** Texts per forward pass during rebuild. */
  batchSize: number;
}

export interface IndexConfig {
  store: 'sqlite' | 'memory';
  persistPath?: string;
}

export interface ApiConfig {
  /** Unix domain socket to listen on. Takes precedence over host/port when set. */
  socketPath?: string;
  host: string;
  port: number;
  /** Shared secret expected in the x-service-token header. */
  token: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  encoder: EncoderConfig;
  index: IndexConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}
