/**
 * SDK Configuration Options
 */
export interface SDKConfig {
  /** Bearer token issued by the identity provider */
  accessToken: string;

  /** Environment to use (production, staging, development) */
  environment?: 'production' | 'staging' | 'development';

  /** Custom base URL (overrides environment) */
  baseUrl?: string;

  /** Custom realtime URL (defaults to the base URL's ws equivalent) */
  realtimeUrl?: string;

  /** Request timeout in milliseconds */
  timeout?: number;

  /** Maximum number of retry attempts for retryable calls */
  maxRetries?: number;

  /** Base delay for retry backoff in milliseconds */
  retryBaseDelay?: number;

  /** Enable debug logging */
  debug?: boolean;

  /** Custom headers to include in all requests */
  headers?: Record<string, string>;
}

/**
 * Internal SDK configuration with defaults applied
 */
export interface ResolvedSDKConfig {
  accessToken: string;
  environment: 'production' | 'staging' | 'development';
  baseUrl: string;
  realtimeUrl: string;
  timeout: number;
  maxRetries: number;
  retryBaseDelay: number;
  debug: boolean;
  headers: Record<string, string>;
}

export const ENVIRONMENTS = {
  production: 'https://api.handoff.link',
  staging: 'https://api-staging.handoff.link',
  development: 'http://localhost:3020',
} as const;

export const API_PREFIX = '/api/v1';

export const DEFAULT_CONFIG = {
  environment: 'production',
  timeout: 15000,
  maxRetries: 3,
  retryBaseDelay: 500,
  debug: false,
} as const;
