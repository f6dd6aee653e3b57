import type { HostType } from '../../config/constants';
import type { ProvisioningResult } from '../../types/domain';

/** Everything a panel needs to create or extend one credential, derived from the order. */
export interface CredentialSpec {
  orderId: string;
  buyerId: string;
  /** Client-supplied reference the panel is queried by before anything is created. */
  email: string;
  clientId: string;
  username: string;
  subscriptionToken: string;
  /** Absolute expiry, so a repeated call converges on the same remote state. */
  targetExpiresAt: Date;
  renewal: boolean;
}

export interface HostClient {
  readonly hostId: string;
  readonly type: HostType;
  ensureCredential(spec: CredentialSpec): Promise<ProvisioningResult>;
  revokeCredential(credentialId: string, email: string): Promise<void>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
