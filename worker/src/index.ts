export * from './domain/types';
export * from './domain/errors';
export { assertTransition, canTransition } from './domain/campaign-status';
export { RateLimiter, MemoryRateBudgetStore } from './core/rate-limiter';
export type { RateBudgetStore, RateLimitConfig, SendCeilings } from './core/rate-limiter';
export type { RateDecision } from './core/sliding-window';
export { RetryPolicy } from './core/retry-policy';
export type { AttemptOutcome, RetryDecision, RetryPolicyConfig } from './core/retry-policy';
export { Dispatcher } from './core/dispatcher';
export type { DispatcherOptions } from './core/dispatcher';
export { CampaignScheduler } from './core/campaign-scheduler';
export type { TickReport } from './core/campaign-scheduler';
export { MemorySendTaskStore } from './core/task-queue';
export type { SendTaskStore, TaskSettlement } from './core/task-queue';
export { DeliveryEventPublisher, MemoryDeliveryEventSink, createDeliveryEvent } from './core/delivery-events';
export type { DeliveryEventSink } from './core/delivery-events';
export { MemoryCampaignRepository } from './core/campaign-repository';
export type { CampaignRepository } from './core/campaign-repository';
export { MemoryEnrollmentStore } from './core/enrollment-store';
export type { EnrollmentStore } from './core/enrollment-store';
export { PlaceholderTemplateRenderer } from './core/template-renderer';
export type { EmailTemplate, TemplateRenderer, TemplateSource } from './core/template-renderer';
export { nextWindowOpen } from './core/send-window';
export { ProviderAdapterPool } from './providers/registry';
export { TransactionalApiAdapter } from './providers/transactional-api.adapter';
export { SmtpAdapter } from './providers/smtp.adapter';
export { OAuthMailboxAdapter } from './providers/oauth-mailbox.adapter';
export { EnvCredentialStore, MemoryCredentialStore } from './providers/credentials';
export type { CredentialStore } from './providers/credentials';
export type { Credentials, ProviderAdapter, SendResult } from './providers/types';
export { createEngine } from './engine';
export type { Engine, EngineDeps } from './engine';
export { loadEngineConfig } from './infra/config';
export type { EngineConfig } from './infra/config';
