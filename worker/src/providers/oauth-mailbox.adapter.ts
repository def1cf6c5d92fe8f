import MailComposer from 'nodemailer/lib/mail-composer';
import { RenderedMessage } from '../domain/types';
import { classifyNetworkError } from './network-errors';
import { Credentials, FetchLike, ProviderAdapter, SendResult, credentialMismatch } from './types';

const GMAIL_SEND_URL = 'https://gmail.googleapis.com/gmail/v1/users';

type MailboxReply = {
  id?: string;
  error?: {
    code?: number;
    message?: string;
    errors?: Array<{ reason?: string }>;
  };
};

const THROTTLE_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded', 'quotaExceeded', 'backendError']);

export class OAuthMailboxAdapter implements ProviderAdapter {
  readonly kind = 'oauth_mailbox' as const;

  constructor(private readonly fetchFn: FetchLike = fetch) {}

  async send(message: RenderedMessage, credentials: Credentials, signal: AbortSignal): Promise<SendResult> {
    if (credentials.kind !== 'oauth') {
      return credentialMismatch(this.kind, credentials);
    }

    const raw = await this.compose(message);
    const mailbox = encodeURIComponent(credentials.mailbox ?? 'me');

    let response: Response;
    try {
      response = await this.fetchFn(`${GMAIL_SEND_URL}/${mailbox}/messages/send`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${credentials.accessToken}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ raw }),
        signal
      });
    } catch (error) {
      return classifyNetworkError(error);
    }

    const payload = await this.readReply(response);
    if (response.ok) {
      return payload.id
        ? { status: 'accepted', providerMessageId: payload.id }
        : { status: 'rejected_permanent', reason: 'provider_missing_message_id' };
    }

    return this.classifyStatus(response.status, payload);
  }

  private classifyStatus(status: number, payload: MailboxReply): SendResult {
    const reasonCode = payload.error?.errors?.[0]?.reason;
    const reason = `http_${status}${reasonCode ? `:${reasonCode}` : ''}`;

    if (status === 401) {
      return { status: 'rejected_permanent', reason: `auth_rejected:${reason}` };
    }
    if (status === 429 || status >= 500 || (reasonCode !== undefined && THROTTLE_REASONS.has(reasonCode))) {
      return { status: 'rejected_transient', reason };
    }
    return { status: 'rejected_permanent', reason };
  }

  private async readReply(response: Response): Promise<MailboxReply> {
    try {
      return (await response.json()) as MailboxReply;
    } catch {
      return {};
    }
  }

  private async compose(message: RenderedMessage): Promise<string> {
    const composer = new MailComposer({
      from: message.from.name ? { name: message.from.name, address: message.from.email } : message.from.email,
      to: message.to.name ? { name: message.to.name, address: message.to.email } : message.to.email,
      replyTo: message.from.replyTo,
      subject: message.subject,
      html: message.html,
      text: message.text,
      headers: message.headers
    });
    return new Promise<string>((resolve, reject) => {
      composer.compile().build((error, mime) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(mime.toString('base64url'));
      });
    });
  }
}
