export type CampaignKind = 'bulk' | 'drip';

export type CampaignStatus = 'draft' | 'scheduled' | 'running' | 'paused' | 'completed' | 'cancelled';

export type ProviderKind = 'transactional_api' | 'smtp_relay' | 'oauth_mailbox' | 'custom_smtp';

export const PROVIDER_KINDS: readonly ProviderKind[] = [
  'transactional_api',
  'smtp_relay',
  'oauth_mailbox',
  'custom_smtp'
];

export type Sender = {
  email: string;
  name?: string;
  replyTo?: string;
};

export type Step = {
  id: string;
  campaignId: string;
  index: number;
  templateId: string;
  offsetMs: number;
  sendWindowId?: string;
};

export type Campaign = {
  id: string;
  accountId: string;
  name: string;
  kind: CampaignKind;
  provider: ProviderKind;
  sender: Sender;
  stepCount: number;
  startAt: Date;
  status: CampaignStatus;
};

export type CampaignSummary = {
  sent: number;
  failed: number;
  withFailures: boolean;
};

export type Recipient = {
  id: string;
  email: string;
  name?: string;
  fields: Record<string, string>;
  suppressed: boolean;
};

export type SendWindow = {
  id: string;
  weekdays: number[];
  startMinute: number;
  endMinute: number;
  utcOffsetMinutes: number;
};

export type RenderedContent = {
  subject: string;
  html: string;
  text?: string;
};

export type RenderedMessage = RenderedContent & {
  from: Sender;
  to: { email: string; name?: string };
  headers: Record<string, string>;
};

export type TaskKey = {
  campaignId: string;
  stepId: string;
  recipientId: string;
};

export type SendTaskStatus = 'pending' | 'in_flight' | 'sent' | 'deferred' | 'failed';

export type DeliveryOutcome =
  | 'accepted'
  | 'rejected'
  | 'rate_limited'
  | 'provider_error'
  | 'permanent_failure'
  | 'cancelled';

export type FailureOutcome = Exclude<DeliveryOutcome, 'accepted' | 'rate_limited'>;

export type SendTask = TaskKey & {
  id: string;
  accountId: string;
  provider: ProviderKind;
  stepIndex: number;
  message: RenderedMessage;
  dueAt: Date;
  attemptCount: number;
  status: SendTaskStatus;
  lastError: string | null;
  providerMessageId: string | null;
  failureOutcome: FailureOutcome | null;
  completedAt: Date | null;
  claimedAt: Date | null;
  createdAt: Date;
};

export type NewSendTask = Pick<
  SendTask,
  'campaignId' | 'stepId' | 'recipientId' | 'accountId' | 'provider' | 'stepIndex' | 'message' | 'dueAt'
>;

export type DeliveryEvent = Readonly<{
  id: string;
  taskId: string | null;
  task: Readonly<TaskKey>;
  accountId: string;
  provider: ProviderKind;
  outcome: DeliveryOutcome;
  occurredAt: Date;
  attemptCount: number;
  providerMessageId: string | null;
  reason: string | null;
}>;

export type EnrollmentState = 'awaiting' | 'materialized' | 'finished';

export type Enrollment = {
  campaignId: string;
  recipientId: string;
  stepIndex: number;
  state: EnrollmentState;
  anchorAt: Date;
  taskId: string | null;
  sentSteps: number;
  failedSteps: number;
  updatedAt: Date;
};

export function taskKeyString(key: TaskKey): string {
  return `${key.campaignId}:${key.stepId}:${key.recipientId}`;
}

export function isTerminalTaskStatus(status: SendTaskStatus): boolean {
  return status === 'sent' || status === 'failed';
}
