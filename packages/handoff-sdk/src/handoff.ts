import { AxiosInstance } from 'axios';
import { SDKConfig, ResolvedSDKConfig, DEFAULT_CONFIG, ENVIRONMENTS, API_PREFIX } from './types/config';
import { ConfigurationError } from './errors';
import { HTTPClient } from './client/http-client';
import { Operations } from './resources/operations';
import { Transfers } from './resources/transfers';
import { Handshake } from './handshake';
import { StatusSubscription } from './realtime/status-subscription';
import { createWebSocketConnector, RealtimeConnector } from './realtime/connection';
import { createSDKLogger, SDKLogger } from './utils/logger';

export interface SDKDependencies {
  /** Preconfigured axios instance, mainly for tests */
  axios?: AxiosInstance;
  /** Realtime connector, mainly for tests */
  connector?: RealtimeConnector;
  logger?: SDKLogger;
}

export interface SubscribeOptions {
  maxReconnectAttempts?: number;
  reconnectBaseDelay?: number;
  reconnectMaxDelay?: number;
}

/**
 * Device-side entry point to the handoff relay
 */
export class HandoffSDK {
  private readonly config: ResolvedSDKConfig;
  private readonly logger: SDKLogger;
  private readonly httpClient: HTTPClient;
  private readonly connector: RealtimeConnector;

  public readonly operations: Operations;
  public readonly transfers: Transfers;
  public readonly handshake: Handshake;

  constructor(config: SDKConfig, dependencies: SDKDependencies = {}) {
    this.config = resolveConfig(config);
    this.logger = dependencies.logger ?? createSDKLogger(this.config.debug);
    this.httpClient = new HTTPClient(this.config, this.logger, dependencies.axios);
    this.connector =
      dependencies.connector ?? createWebSocketConnector(this.config.realtimeUrl, this.config.accessToken, this.logger);

    this.operations = new Operations(this.httpClient);
    this.transfers = new Transfers(this.httpClient);
    this.handshake = new Handshake(
      this.operations,
      this.transfers,
      (operationId) => this.subscribe(operationId),
      () => this.httpClient.newIdempotencyKey(),
      this.logger
    );
  }

  /**
   * Open a status stream for an operation. The first message is the
   * operation's current state.
   */
  subscribe(operationId: string, options: SubscribeOptions = {}): StatusSubscription {
    return new StatusSubscription({
      operationId,
      connector: this.connector,
      logger: this.logger,
      maxReconnectAttempts: options.maxReconnectAttempts ?? this.config.maxRetries,
      reconnectBaseDelay: options.reconnectBaseDelay ?? this.config.retryBaseDelay,
      reconnectMaxDelay: options.reconnectMaxDelay,
    }).start();
  }

  getConfig(): Readonly<ResolvedSDKConfig> {
    return Object.freeze({ ...this.config, headers: { ...this.config.headers } });
  }
}

export function resolveConfig(config: SDKConfig): ResolvedSDKConfig {
  if (!config.accessToken) {
    throw new ConfigurationError('Access token is required');
  }

  const environment = config.environment ?? DEFAULT_CONFIG.environment;
  const origin = (config.baseUrl ?? ENVIRONMENTS[environment]).replace(/\/+$/, '');
  const baseUrl = origin.endsWith(API_PREFIX) ? origin : `${origin}${API_PREFIX}`;

  let realtimeUrl = config.realtimeUrl;
  if (!realtimeUrl) {
    const url = new URL(`${baseUrl}/realtime`);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    realtimeUrl = url.toString();
  }

  if (config.maxRetries !== undefined && (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)) {
    throw new ConfigurationError('maxRetries must be a non-negative integer');
  }

  return {
    accessToken: config.accessToken,
    environment,
    baseUrl,
    realtimeUrl,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    retryBaseDelay: config.retryBaseDelay ?? DEFAULT_CONFIG.retryBaseDelay,
    debug: config.debug ?? DEFAULT_CONFIG.debug,
    headers: { ...config.headers },
  };
}
