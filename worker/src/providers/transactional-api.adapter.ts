import { randomUUID } from 'node:crypto';
import { RenderedMessage } from '../domain/types';
import { Credentials, FetchLike, ProviderAdapter, SendResult, credentialMismatch } from './types';
import { classifyNetworkError } from './network-errors';

const DEFAULT_ENDPOINT = 'https://api.sendgrid.com/v3/mail/send';

type ApiErrorPayload = {
  errors?: Array<{ message?: string; field?: string }>;
};

type ApiAcceptedPayload = {
  id?: string;
  message_id?: string;
};

export class TransactionalApiAdapter implements ProviderAdapter {
  readonly kind = 'transactional_api' as const;

  constructor(private readonly fetchFn: FetchLike = fetch) {}

  async send(message: RenderedMessage, credentials: Credentials, signal: AbortSignal): Promise<SendResult> {
    if (credentials.kind !== 'api_key') {
      return credentialMismatch(this.kind, credentials);
    }

    let response: Response;
    try {
      response = await this.fetchFn(credentials.endpoint ?? DEFAULT_ENDPOINT, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${credentials.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(this.toPayload(message)),
        signal
      });
    } catch (error) {
      return classifyNetworkError(error);
    }

    if (response.ok) {
      const providerMessageId =
        response.headers.get('x-message-id') ?? (await this.readMessageId(response)) ?? `local-${randomUUID()}`;
      return { status: 'accepted', providerMessageId };
    }

    const detail = await this.readError(response);
    return this.classifyStatus(response.status, detail);
  }

  private classifyStatus(status: number, detail: string | null): SendResult {
    const reason = detail ? `http_${status}:${detail}` : `http_${status}`;
    if (status === 408 || status === 429 || status >= 500) {
      return { status: 'rejected_transient', reason };
    }
    if (status === 401 || status === 403) {
      return { status: 'rejected_permanent', reason: `auth_rejected:${reason}` };
    }
    return { status: 'rejected_permanent', reason };
  }

  private async readMessageId(response: Response): Promise<string | null> {
    try {
      const payload = (await response.json()) as ApiAcceptedPayload;
      return payload.id ?? payload.message_id ?? null;
    } catch {
      return null;
    }
  }

  private async readError(response: Response): Promise<string | null> {
    try {
      const payload = (await response.json()) as ApiErrorPayload;
      const first = payload.errors?.[0];
      if (!first?.message) {
        return null;
      }
      return first.field ? `${first.field}:${first.message}` : first.message;
    } catch {
      return null;
    }
  }

  private toPayload(message: RenderedMessage): Record<string, unknown> {
    const content: Array<{ type: string; value: string }> = [];
    if (message.text) {
      content.push({ type: 'text/plain', value: message.text });
    }
    content.push({ type: 'text/html', value: message.html });

    return {
      personalizations: [{ to: [{ email: message.to.email, name: message.to.name }] }],
      from: { email: message.from.email, name: message.from.name },
      reply_to: message.from.replyTo ? { email: message.from.replyTo } : undefined,
      subject: message.subject,
      content,
      headers: message.headers
    };
  }
}
