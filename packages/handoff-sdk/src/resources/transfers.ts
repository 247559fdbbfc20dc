import { HTTPClient, MutationOptions } from '../client/http-client';
import {
  APIResponse,
  AttachDeliveriesResponse,
  ClaimResponse,
  LookupResponse,
  TransferTokenView,
} from '../types/api';

/**
 * Transfer tokens, claims and the email fallback
 */
export class Transfers {
  constructor(private readonly client: HTTPClient) {}

  async issueToken(ticketId: string, ttlSeconds?: number, options?: MutationOptions): Promise<TransferTokenView> {
    const response = await this.client.post<APIResponse<TransferTokenView>>(
      '/transfers/tokens',
      { ticket_id: ticketId, ttl_seconds: ttlSeconds },
      options
    );
    return response.data;
  }

  /**
   * Redeem a transfer token. Rejections come back as a result, not an error.
   */
  async claim(transferToken: string, options?: MutationOptions): Promise<ClaimResponse> {
    return this.client.post<ClaimResponse>(
      '/claim',
      { transfer_token: transferToken },
      { ...options, validateStatus: (status) => status === 200 || status === 404 || status === 409 || status === 410 }
    );
  }

  async lookup(email: string): Promise<LookupResponse> {
    const response = await this.client.post<APIResponse<LookupResponse>>('/claims/lookup', { email });
    return response.data;
  }

  /**
   * Take ownership of tickets delivered to the caller's email before they registered
   */
  async attachDeliveries(options?: MutationOptions): Promise<AttachDeliveriesResponse> {
    const response = await this.client.post<APIResponse<AttachDeliveriesResponse>>('/deliveries/attach', {}, options);
    return response.data;
  }
}
