import { CredentialError } from '../domain/errors';
import { ProviderKind } from '../domain/types';
import { Credentials } from './types';

export interface CredentialStore {
  resolve(accountId: string, provider: ProviderKind): Promise<Credentials>;
}

export class MemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, Credentials>();

  set(accountId: string, provider: ProviderKind, credentials: Credentials): void {
    this.entries.set(`${accountId}:${provider}`, credentials);
  }

  delete(accountId: string, provider: ProviderKind): void {
    this.entries.delete(`${accountId}:${provider}`);
  }

  async resolve(accountId: string, provider: ProviderKind): Promise<Credentials> {
    const credentials = this.entries.get(`${accountId}:${provider}`);
    if (!credentials) {
      throw new CredentialError(accountId, provider, 'missing');
    }
    assertNotExpired(accountId, provider, credentials);
    return credentials;
  }
}

type Env = Record<string, string | undefined>;

/**
 * Reads credentials from `MAIL_<ACCOUNT>_<PROVIDER>_*` variables, falling back
 * to the account-less `MAIL_<PROVIDER>_*` set shared by every account.
 */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly env: Env = process.env) {}

  async resolve(accountId: string, provider: ProviderKind): Promise<Credentials> {
    const scoped = `MAIL_${envToken(accountId)}_${envToken(provider)}`;
    const shared = `MAIL_${envToken(provider)}`;
    const credentials = this.read(scoped, provider) ?? this.read(shared, provider);
    if (!credentials) {
      throw new CredentialError(accountId, provider, 'missing');
    }
    assertNotExpired(accountId, provider, credentials);
    return credentials;
  }

  private read(prefix: string, provider: ProviderKind): Credentials | null {
    switch (provider) {
      case 'transactional_api': {
        const apiKey = this.env[`${prefix}_API_KEY`];
        return apiKey ? { kind: 'api_key', apiKey, endpoint: this.env[`${prefix}_ENDPOINT`] } : null;
      }
      case 'oauth_mailbox': {
        const accessToken = this.env[`${prefix}_ACCESS_TOKEN`];
        if (!accessToken) {
          return null;
        }
        const expiresAt = this.env[`${prefix}_EXPIRES_AT`];
        return {
          kind: 'oauth',
          accessToken,
          mailbox: this.env[`${prefix}_MAILBOX`],
          expiresAt: expiresAt ? new Date(expiresAt) : undefined
        };
      }
      case 'smtp_relay':
      case 'custom_smtp': {
        const host = this.env[`${prefix}_HOST`];
        const password = this.env[`${prefix}_PASSWORD`];
        const username = this.env[`${prefix}_USERNAME`];
        if (!host || !password || !username) {
          return null;
        }
        const port = Number(this.env[`${prefix}_PORT`] ?? 587);
        return {
          kind: 'smtp',
          host,
          port,
          secure: (this.env[`${prefix}_SECURE`] ?? String(port === 465)) === 'true',
          username,
          password
        };
      }
    }
  }
}

function envToken(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
}

function assertNotExpired(accountId: string, provider: ProviderKind, credentials: Credentials): void {
  if (credentials.kind === 'oauth' && credentials.expiresAt && credentials.expiresAt.getTime() <= Date.now()) {
    throw new CredentialError(accountId, provider, 'expired');
  }
}
