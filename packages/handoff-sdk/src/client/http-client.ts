import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { randomUUID } from 'crypto';
import { ResolvedSDKConfig } from '../types/config';
import { handleAPIError } from '../errors';
import { retryWithBackoff } from '../utils/retry';
import { SDKLogger } from '../utils/logger';

export interface MutationOptions {
  /**
   * Makes the call safe to retry: the relay replays the first response for a
   * repeated key instead of executing the mutation again.
   */
  idempotencyKey?: string;

  /** Statuses resolved as data instead of thrown (defaults to 2xx) */
  validateStatus?: (status: number) => boolean;
}

/**
 * HTTP client for making relay API requests.
 *
 * Reads are retried with backoff on transient failures. Mutations are sent
 * once unless the caller supplies an idempotency key.
 */
export class HTTPClient {
  private readonly axios: AxiosInstance;

  constructor(
    private readonly config: ResolvedSDKConfig,
    private readonly logger: SDKLogger,
    instance?: AxiosInstance
  ) {
    this.axios =
      instance ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeout,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'handoff-sdk/1.0.0',
          ...config.headers,
        },
      });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.axios.interceptors.request.use((request) => {
      request.headers.set('Authorization', `Bearer ${this.config.accessToken}`);
      this.logger.debug({ method: request.method, url: request.url }, 'request');
      return request;
    });

    this.axios.interceptors.response.use(
      (response) => {
        this.logger.debug({ status: response.status, url: response.config.url }, 'response');
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          this.logger.debug(
            { status: error.response?.status, url: error.config?.url, code: error.code },
            'response error'
          );
        }
        return Promise.reject(error);
      }
    );
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    return this.withRetry(() => this.send<T>({ ...config, method: 'GET', url }));
  }

  async post<T>(url: string, data?: unknown, options: MutationOptions = {}): Promise<T> {
    const request: AxiosRequestConfig = { method: 'POST', url, data };
    if (options.validateStatus) {
      request.validateStatus = options.validateStatus;
    }

    if (!options.idempotencyKey) {
      return this.send<T>(request);
    }

    request.headers = { 'Idempotency-Key': options.idempotencyKey };
    return this.withRetry(() => this.send<T>(request));
  }

  newIdempotencyKey(): string {
    return randomUUID();
  }

  private async send<T>(request: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.axios.request<T>(request);
      return response.data;
    } catch (error) {
      handleAPIError(error);
    }
  }

  private withRetry<T>(fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      maxRetries: this.config.maxRetries,
      baseDelay: this.config.retryBaseDelay,
      onRetry: (attempt, error) => {
        this.logger.debug({ attempt, err: error }, 'retrying request');
      },
    });
  }
}
