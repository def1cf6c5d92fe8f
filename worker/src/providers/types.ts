import { ProviderKind, RenderedMessage } from '../domain/types';

export type ApiKeyCredentials = {
  kind: 'api_key';
  apiKey: string;
  endpoint?: string;
};

export type SmtpCredentials = {
  kind: 'smtp';
  host: string;
  port: number;
  secure: boolean;
  username: string;
  password: string;
};

export type OAuthCredentials = {
  kind: 'oauth';
  accessToken: string;
  expiresAt?: Date;
  mailbox?: string;
};

export type Credentials = ApiKeyCredentials | SmtpCredentials | OAuthCredentials;

export type SendResult =
  | { status: 'accepted'; providerMessageId: string }
  | { status: 'rejected_permanent'; reason: string }
  | { status: 'rejected_transient'; reason: string };

/**
 * One network send per call. Adapters classify failures into permanent and
 * transient and never retry on their own.
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  send(message: RenderedMessage, credentials: Credentials, signal: AbortSignal): Promise<SendResult>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export function credentialMismatch(kind: ProviderKind, credentials: Credentials): SendResult {
  return { status: 'rejected_permanent', reason: `credentials_kind_mismatch:${kind}:${credentials.kind}` };
}
