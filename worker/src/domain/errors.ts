export type DispatchErrorCode =
  | 'validation_error'
  | 'render_error'
  | 'credential_error'
  | 'provider_transient'
  | 'provider_permanent'
  | 'internal_dispatch_error';

export abstract class DispatchEngineError extends Error {
  abstract readonly code: DispatchErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends DispatchEngineError {
  readonly code = 'validation_error';

  constructor(
    message: string,
    public readonly campaignId?: string
  ) {
    super(message);
  }
}

export class RenderError extends DispatchEngineError {
  readonly code = 'render_error';

  constructor(
    public readonly templateId: string,
    public readonly missingField: string | null,
    message = missingField ? `missing_field:${missingField}` : 'render_failed'
  ) {
    super(message);
  }
}

export class CredentialError extends DispatchEngineError {
  readonly code = 'credential_error';

  constructor(
    public readonly accountId: string,
    public readonly provider: string,
    public readonly reason: 'missing' | 'expired' | 'invalid'
  ) {
    super(`credentials_${reason}:${accountId}:${provider}`);
  }
}

export class ProviderTransientError extends DispatchEngineError {
  readonly code = 'provider_transient';
}

export class ProviderPermanentError extends DispatchEngineError {
  readonly code = 'provider_permanent';
}

export class InternalDispatchError extends DispatchEngineError {
  readonly code = 'internal_dispatch_error';

  constructor(
    message: string,
    public readonly source?: unknown
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
