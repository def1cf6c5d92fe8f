import { createHash } from 'node:crypto';
import nodemailer, { SendMailOptions } from 'nodemailer';
import { RenderedMessage } from '../domain/types';
import { classifyNetworkError } from './network-errors';
import { Credentials, ProviderAdapter, SendResult, SmtpCredentials, credentialMismatch } from './types';

export type SmtpTransport = {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string; rejected?: unknown[] }>;
  close(): void;
};

export type SmtpTransportFactory = (credentials: SmtpCredentials) => SmtpTransport;

export const createNodemailerTransport: SmtpTransportFactory = (credentials) =>
  nodemailer.createTransport({
    host: credentials.host,
    port: credentials.port,
    secure: credentials.secure,
    auth: { user: credentials.username, pass: credentials.password },
    pool: true,
    connectionTimeout: 10_000,
    socketTimeout: 30_000
  });

type SmtpFailure = {
  code: string | null;
  responseCode: number | null;
  response: string | null;
};

function readFailure(error: unknown): SmtpFailure {
  const failure: SmtpFailure = { code: null, responseCode: null, response: null };
  if (typeof error !== 'object' || error === null) {
    return failure;
  }
  if ('code' in error && typeof error.code === 'string') {
    failure.code = error.code;
  }
  if ('responseCode' in error && typeof error.responseCode === 'number') {
    failure.responseCode = error.responseCode;
  }
  if ('response' in error && typeof error.response === 'string') {
    failure.response = error.response;
  }
  return failure;
}

export class SmtpAdapter implements ProviderAdapter {
  private readonly transports = new Map<string, SmtpTransport>();

  constructor(
    readonly kind: 'smtp_relay' | 'custom_smtp',
    private readonly createTransport: SmtpTransportFactory = createNodemailerTransport
  ) {}

  async send(message: RenderedMessage, credentials: Credentials, signal: AbortSignal): Promise<SendResult> {
    if (credentials.kind !== 'smtp') {
      return credentialMismatch(this.kind, credentials);
    }
    if (signal.aborted) {
      return { status: 'rejected_transient', reason: 'send_timeout' };
    }

    const transport = this.transportFor(credentials);
    const sending = transport.sendMail(this.toMailOptions(message));

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<SendResult>((resolve) => {
      onAbort = () => resolve({ status: 'rejected_transient', reason: 'send_timeout' });
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([sending.then((info) => this.toResult(info)), aborted]);
    } catch (error) {
      return this.classify(error);
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
      // A send that outlives its timeout settles later; its outcome is already reported as transient.
      void sending.catch(() => undefined);
    }
  }

  close(): void {
    for (const transport of this.transports.values()) {
      transport.close();
    }
    this.transports.clear();
  }

  private transportFor(credentials: SmtpCredentials): SmtpTransport {
    const secretHash = createHash('sha256').update(credentials.password).digest('hex').slice(0, 12);
    const key = `${credentials.host}:${credentials.port}:${credentials.username}:${secretHash}`;
    let transport = this.transports.get(key);
    if (!transport) {
      transport = this.createTransport(credentials);
      this.transports.set(key, transport);
    }
    return transport;
  }

  private toMailOptions(message: RenderedMessage): SendMailOptions {
    return {
      from: message.from.name ? { name: message.from.name, address: message.from.email } : message.from.email,
      to: message.to.name ? { name: message.to.name, address: message.to.email } : message.to.email,
      replyTo: message.from.replyTo,
      subject: message.subject,
      html: message.html,
      text: message.text,
      headers: message.headers
    };
  }

  private toResult(info: { messageId?: string; rejected?: unknown[] }): SendResult {
    if (info.rejected && info.rejected.length > 0) {
      return { status: 'rejected_permanent', reason: 'recipient_rejected' };
    }
    if (!info.messageId) {
      return { status: 'rejected_permanent', reason: 'provider_missing_message_id' };
    }
    return { status: 'accepted', providerMessageId: info.messageId };
  }

  private classify(error: unknown): SendResult {
    const { code, responseCode, response } = readFailure(error);

    if (responseCode !== null) {
      const reason = `smtp_${responseCode}${response ? `:${response}` : ''}`;
      return responseCode >= 500
        ? { status: 'rejected_permanent', reason }
        : { status: 'rejected_transient', reason };
    }

    if (code === 'EAUTH') {
      return { status: 'rejected_permanent', reason: 'auth_rejected' };
    }
    if (code === 'EENVELOPE' || code === 'EMESSAGE') {
      return { status: 'rejected_permanent', reason: `smtp_${code.toLowerCase()}` };
    }

    return classifyNetworkError(error);
  }
}
