/**
 * Base options interface for inference backends
 * Provider-specific options should extend this interface
 */
export interface BackendOptions<TClient = unknown> {
  /** API key for authentication (overrides environment variable) */
  apiKey?: string;
  /** Pre-configured client instance (for testing or custom configuration) */
  client?: TClient;
  /** Model used when neither the persona nor the client names one */
  defaultModel?: string;
}
