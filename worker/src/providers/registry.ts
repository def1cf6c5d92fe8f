import { ProviderKind } from '../domain/types';
import { OAuthMailboxAdapter } from './oauth-mailbox.adapter';
import { SmtpAdapter } from './smtp.adapter';
import { TransactionalApiAdapter } from './transactional-api.adapter';
import { ProviderAdapter } from './types';

export class ProviderAdapterPool {
  private readonly adapters = new Map<ProviderKind, ProviderAdapter>();

  constructor(adapters: ProviderAdapter[]) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.kind, adapter);
    }
  }

  static withDefaults(): ProviderAdapterPool {
    return new ProviderAdapterPool([
      new TransactionalApiAdapter(),
      new SmtpAdapter('smtp_relay'),
      new OAuthMailboxAdapter(),
      new SmtpAdapter('custom_smtp')
    ]);
  }

  get(kind: ProviderKind): ProviderAdapter | null {
    return this.adapters.get(kind) ?? null;
  }

  has(kind: ProviderKind): boolean {
    return this.adapters.has(kind);
  }

  close(): void {
    for (const adapter of this.adapters.values()) {
      if (adapter instanceof SmtpAdapter) {
        adapter.close();
      }
    }
  }
}
