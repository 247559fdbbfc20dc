import { HTTPClient, MutationOptions } from '../client/http-client';
import {
  APIResponse,
  CreatedOperation,
  CreateOperationParams,
  DeliveryResponse,
  OperationSnapshot,
} from '../types/api';

/**
 * Pending operations on the relay
 */
export class Operations {
  constructor(private readonly client: HTTPClient) {}

  async create(params: CreateOperationParams, options?: MutationOptions): Promise<CreatedOperation> {
    const response = await this.client.post<APIResponse<CreatedOperation>>('/operations', params, options);
    return response.data;
  }

  /**
   * Current snapshot. Retried on transient failures.
   */
  async get(operationId: string): Promise<OperationSnapshot> {
    const response = await this.client.get<APIResponse<OperationSnapshot>>(`/operations/${encodeURIComponent(operationId)}`);
    return response.data;
  }

  /**
   * Non-terminal operations addressed to the caller as counterparty
   */
  async incoming(): Promise<OperationSnapshot[]> {
    const response = await this.client.get<APIResponse<OperationSnapshot[]>>('/operations/incoming');
    return response.data;
  }

  async attachCounterparty(operationId: string, counterpartyActorId: string, options?: MutationOptions): Promise<OperationSnapshot> {
    return this.transition(operationId, 'counterparty', { counterparty_actor_id: counterpartyActorId }, options);
  }

  async acknowledge(operationId: string, options?: MutationOptions): Promise<OperationSnapshot> {
    return this.transition(operationId, 'acknowledge', {}, options);
  }

  async complete(operationId: string, paymentReference: string, options?: MutationOptions): Promise<OperationSnapshot> {
    return this.transition(operationId, 'complete', { payment_reference: paymentReference }, options);
  }

  async fail(operationId: string, reason: string, options?: MutationOptions): Promise<OperationSnapshot> {
    return this.transition(operationId, 'fail', { reason }, options);
  }

  async cancel(operationId: string, options?: MutationOptions): Promise<OperationSnapshot> {
    return this.transition(operationId, 'cancel', {}, options);
  }

  /**
   * Complete a transfer without proximity by sending it to an email address
   */
  async deliverToEmail(operationId: string, email: string, options?: MutationOptions): Promise<DeliveryResponse> {
    const response = await this.client.post<APIResponse<DeliveryResponse>>(
      `/operations/${encodeURIComponent(operationId)}/deliver`,
      { email },
      options
    );
    return response.data;
  }

  private async transition(
    operationId: string,
    action: string,
    body: Record<string, unknown>,
    options?: MutationOptions
  ): Promise<OperationSnapshot> {
    const response = await this.client.post<APIResponse<OperationSnapshot>>(
      `/operations/${encodeURIComponent(operationId)}/${action}`,
      body,
      options
    );
    return response.data;
  }
}
