import { RenderError, ValidationError, errorMessage } from '../domain/errors';
import {
  Campaign,
  CampaignSummary,
  DeliveryEvent,
  Enrollment,
  PROVIDER_KINDS,
  Recipient,
  RenderedMessage,
  SendWindow,
  Step,
  isTerminalTaskStatus
} from '../domain/types';
import { Logger, silentLogger } from '../infra/logger';
import { WorkerMetrics } from '../infra/metrics';
import { CampaignRepository } from './campaign-repository';
import { Clock, systemClock } from './clock';
import { DeliveryEventPublisher, createDeliveryEvent } from './delivery-events';
import { EnrollmentStore } from './enrollment-store';
import { nextWindowOpen } from './send-window';
import { SendTaskStore } from './task-queue';
import { TemplateRenderer } from './template-renderer';

export type SchedulerDeps = {
  repository: CampaignRepository;
  renderer: TemplateRenderer;
  store: SendTaskStore;
  enrollments: EnrollmentStore;
  events: DeliveryEventPublisher;
  sendWindows: Record<string, SendWindow>;
  clock?: Clock;
  logger?: Logger;
  metrics?: WorkerMetrics;
};

export type TickReport = {
  campaignsScanned: number;
  campaignsStarted: number;
  campaignsCompleted: number;
  tasksMaterialized: number;
  renderFailures: number;
};

type ScanContext = {
  campaign: Campaign;
  steps: Step[];
  now: Date;
  report: TickReport;
};

type AdvanceResult = 'continue' | 'campaign_cancelled';

export class CampaignScheduler {
  private readonly repository: CampaignRepository;
  private readonly renderer: TemplateRenderer;
  private readonly store: SendTaskStore;
  private readonly enrollments: EnrollmentStore;
  private readonly events: DeliveryEventPublisher;
  private readonly sendWindows: Record<string, SendWindow>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics?: WorkerMetrics;
  private readonly cancelling = new Set<string>();

  constructor(deps: SchedulerDeps) {
    this.repository = deps.repository;
    this.renderer = deps.renderer;
    this.store = deps.store;
    this.enrollments = deps.enrollments;
    this.events = deps.events;
    this.sendWindows = deps.sendWindows;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.metrics = deps.metrics;
  }

  async tick(): Promise<TickReport> {
    const now = this.clock.now();
    const report: TickReport = {
      campaignsScanned: 0,
      campaignsStarted: 0,
      campaignsCompleted: 0,
      tasksMaterialized: 0,
      renderFailures: 0
    };

    const campaigns = await this.repository.getActiveCampaigns();
    for (const campaign of campaigns) {
      report.campaignsScanned += 1;
      try {
        await this.scan(campaign, now, report);
      } catch (error) {
        await this.onScanError(campaign, error);
      }
    }

    if (report.tasksMaterialized > 0 || report.campaignsCompleted > 0 || report.campaignsStarted > 0) {
      this.logger.log({ type: 'scheduler_tick', ...report }, 'CampaignScheduler');
    }
    return report;
  }

  async pause(campaignId: string): Promise<Campaign> {
    const campaign = await this.repository.updateStatus(campaignId, 'paused');
    this.logger.log({ type: 'campaign_paused', campaignId }, 'CampaignScheduler');
    return campaign;
  }

  async resume(campaignId: string): Promise<Campaign> {
    const campaign = await this.repository.updateStatus(campaignId, 'running');
    this.logger.log({ type: 'campaign_resumed', campaignId }, 'CampaignScheduler');
    return campaign;
  }

  /** Fails every not-yet-claimed task of the campaign. In-flight sends finish on their own. */
  async cancel(campaignId: string): Promise<number> {
    this.cancelling.add(campaignId);
    try {
      await this.repository.updateStatus(campaignId, 'cancelled');
    } catch (error) {
      this.cancelling.delete(campaignId);
      throw error;
    }

    const now = this.clock.now();
    const cancelled = await this.store.cancelCampaign(campaignId, now);
    for (const task of cancelled) {
      this.metrics?.incFailed(task.provider, 'cancelled');
      await this.publish(
        createDeliveryEvent({
          taskId: task.id,
          task,
          accountId: task.accountId,
          provider: task.provider,
          outcome: 'cancelled',
          occurredAt: task.completedAt ?? now,
          attemptCount: task.attemptCount,
          reason: task.lastError
        })
      );
    }

    this.logger.log({ type: 'campaign_cancelled', campaignId, tasksCancelled: cancelled.length }, 'CampaignScheduler');
    return cancelled.length;
  }

  private async scan(campaign: Campaign, now: Date, report: TickReport): Promise<void> {
    if (campaign.status === 'paused' || this.cancelling.has(campaign.id)) {
      return;
    }
    if (campaign.status === 'scheduled' && campaign.startAt.getTime() > now.getTime()) {
      return;
    }

    const steps = await this.loadSteps(campaign);

    if (campaign.status === 'scheduled') {
      await this.repository.updateStatus(campaign.id, 'running');
      report.campaignsStarted += 1;
      this.logger.log({ type: 'campaign_started', campaignId: campaign.id, kind: campaign.kind }, 'CampaignScheduler');
    }

    const recipients = (await this.repository.getRecipients(campaign.id)).filter((recipient) => !recipient.suppressed);
    const existing = new Map((await this.enrollments.listByCampaign(campaign.id)).map((item) => [item.recipientId, item]));
    const context: ScanContext = { campaign, steps, now, report };

    let allFinished = true;
    const summary: CampaignSummary = { sent: 0, failed: 0, withFailures: false };

    for (const recipient of recipients) {
      const enrollment = existing.get(recipient.id) ?? this.enroll(campaign, recipient, now);
      if (enrollment.state !== 'finished') {
        if ((await this.advance(context, recipient, enrollment)) === 'campaign_cancelled') {
          return;
        }
      }

      summary.sent += enrollment.sentSteps;
      summary.failed += enrollment.failedSteps;
      if (enrollment.state !== 'finished') {
        allFinished = false;
      }
    }

    if (allFinished && !this.cancelling.has(campaign.id)) {
      summary.withFailures = summary.failed > 0;
      await this.repository.updateStatus(campaign.id, 'completed', summary);
      report.campaignsCompleted += 1;
      this.logger.log({ type: 'campaign_completed', campaignId: campaign.id, ...summary }, 'CampaignScheduler');
    }
  }

  private enroll(campaign: Campaign, recipient: Recipient, now: Date): Enrollment {
    return {
      campaignId: campaign.id,
      recipientId: recipient.id,
      stepIndex: 0,
      state: 'awaiting',
      anchorAt: campaign.startAt,
      taskId: null,
      sentSteps: 0,
      failedSteps: 0,
      updatedAt: now
    };
  }

  /** Moves one recipient forward as far as the current data allows. Mutates `enrollment`. */
  private async advance(context: ScanContext, recipient: Recipient, enrollment: Enrollment): Promise<AdvanceResult> {
    const { campaign, steps, now } = context;

    while (enrollment.state !== 'finished') {
      if (this.cancelling.has(campaign.id)) {
        return 'campaign_cancelled';
      }

      if (enrollment.state === 'materialized') {
        const task = enrollment.taskId ? await this.store.get(enrollment.taskId) : null;
        if (!task) {
          enrollment.state = 'awaiting';
          enrollment.taskId = null;
          continue;
        }
        if (!isTerminalTaskStatus(task.status)) {
          return 'continue';
        }

        if (task.status === 'sent') {
          enrollment.sentSteps += 1;
        } else {
          enrollment.failedSteps += 1;
        }
        this.moveNext(campaign, steps, enrollment, task.failureOutcome === 'cancelled', task.completedAt ?? now, now);
        await this.enrollments.save(enrollment);
        continue;
      }

      const step = steps[enrollment.stepIndex];
      const message = await this.renderFor(campaign, step, recipient, now, context.report);
      if (!message) {
        enrollment.failedSteps += 1;
        this.moveNext(campaign, steps, enrollment, false, now, now);
        await this.enrollments.save(enrollment);
        continue;
      }

      const inserted = await this.store.insert(
        {
          campaignId: campaign.id,
          stepId: step.id,
          recipientId: recipient.id,
          accountId: campaign.accountId,
          provider: campaign.provider,
          stepIndex: step.index,
          message,
          dueAt: this.dueAt(enrollment.anchorAt, step)
        },
        now
      );
      if (!inserted) {
        return 'campaign_cancelled';
      }

      if (inserted.created) {
        context.report.tasksMaterialized += 1;
        this.metrics?.incMaterialized(campaign.kind);
      }
      enrollment.state = 'materialized';
      enrollment.taskId = inserted.task.id;
      enrollment.updatedAt = now;
      await this.enrollments.save(enrollment);
    }

    return 'continue';
  }

  private moveNext(
    campaign: Campaign,
    steps: Step[],
    enrollment: Enrollment,
    stop: boolean,
    anchorAt: Date,
    now: Date
  ): void {
    enrollment.taskId = null;
    enrollment.updatedAt = now;

    if (stop || campaign.kind === 'bulk' || enrollment.stepIndex + 1 >= steps.length) {
      enrollment.state = 'finished';
      return;
    }

    enrollment.stepIndex += 1;
    enrollment.anchorAt = anchorAt;
    enrollment.state = 'awaiting';
  }

  private dueAt(anchorAt: Date, step: Step): Date {
    const due = new Date(anchorAt.getTime() + step.offsetMs);
    if (!step.sendWindowId) {
      return due;
    }
    const window = this.sendWindows[step.sendWindowId];
    if (!window) {
      throw new ValidationError(`unknown_send_window:${step.sendWindowId}`, step.campaignId);
    }
    return nextWindowOpen(due, window);
  }

  private async renderFor(
    campaign: Campaign,
    step: Step,
    recipient: Recipient,
    now: Date,
    report: TickReport
  ): Promise<RenderedMessage | null> {
    const fields: Record<string, string> = { ...recipient.fields, email: recipient.email };
    if (recipient.name) {
      fields.name = recipient.name;
    }

    try {
      const content = await this.renderer.render(step.templateId, fields);
      return {
        ...content,
        from: campaign.sender,
        to: { email: recipient.email, name: recipient.name },
        headers: {
          'X-Campaign-Id': campaign.id,
          'X-Campaign-Step': String(step.index)
        }
      };
    } catch (error) {
      if (!(error instanceof RenderError)) {
        throw error;
      }

      report.renderFailures += 1;
      this.metrics?.incRenderFailure();
      this.logger.warn(
        { type: 'render_failed', campaignId: campaign.id, stepIndex: step.index, recipientId: recipient.id, reason: error.message },
        'CampaignScheduler'
      );
      await this.publish(
        createDeliveryEvent({
          taskId: null,
          task: { campaignId: campaign.id, stepId: step.id, recipientId: recipient.id },
          accountId: campaign.accountId,
          provider: campaign.provider,
          outcome: 'permanent_failure',
          occurredAt: now,
          attemptCount: 0,
          reason: `render_error:${error.message}`
        })
      );
      return null;
    }
  }

  private async loadSteps(campaign: Campaign): Promise<Step[]> {
    if (!campaign.sender.email) {
      throw new ValidationError('sender_email_missing', campaign.id);
    }
    if (!PROVIDER_KINDS.includes(campaign.provider)) {
      throw new ValidationError(`unknown_provider:${campaign.provider}`, campaign.id);
    }
    if (campaign.stepCount < 1) {
      throw new ValidationError('campaign_has_no_steps', campaign.id);
    }
    if (campaign.kind === 'bulk' && campaign.stepCount !== 1) {
      throw new ValidationError('bulk_campaign_requires_one_step', campaign.id);
    }

    const steps: Step[] = [];
    for (let index = 0; index < campaign.stepCount; index++) {
      const step = await this.repository.getStep(campaign.id, index);
      if (!step || step.index !== index) {
        throw new ValidationError(`missing_step:${index}`, campaign.id);
      }
      if (!Number.isFinite(step.offsetMs) || step.offsetMs < 0) {
        throw new ValidationError(`invalid_step_offset:${index}`, campaign.id);
      }
      if (step.sendWindowId && !this.sendWindows[step.sendWindowId]) {
        throw new ValidationError(`unknown_send_window:${step.sendWindowId}`, campaign.id);
      }
      steps.push(step);
    }
    return steps;
  }

  private async onScanError(campaign: Campaign, error: unknown): Promise<void> {
    if (error instanceof ValidationError) {
      this.logger.warn({ type: 'campaign_invalid', campaignId: campaign.id, reason: error.message }, 'CampaignScheduler');
      await this.repository.reportProblem(campaign.id, error.message);
      return;
    }

    this.logger.error(
      { type: 'campaign_scan_failed', campaignId: campaign.id, reason: errorMessage(error, 'unknown') },
      error instanceof Error ? error.stack : undefined,
      'CampaignScheduler'
    );
  }

  private async publish(event: DeliveryEvent): Promise<void> {
    await this.events.publish(event);
  }
}
