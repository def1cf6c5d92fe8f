import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { MemoryCampaignRepository } from '../core/campaign-repository';
import { CampaignScheduler } from '../core/campaign-scheduler';
import { DeliveryEventPublisher, DeliveryEventSink, MemoryDeliveryEventSink } from '../core/delivery-events';
import { MemoryEnrollmentStore } from '../core/enrollment-store';
import { MemorySendTaskStore } from '../core/task-queue';
import { PlaceholderTemplateRenderer } from '../core/template-renderer';
import { Campaign, CampaignStatus, CampaignSummary, Recipient, SendTask, Step } from '../domain/types';
import { GatedSink, ManualClock, businessHours } from './support/fakes';

const DAY = 24 * 60 * 60 * 1000;
const t0 = new Date('2026-03-02T10:00:00.000Z');

function campaign(overrides: Partial<Campaign> = {}): Campaign {
  return {
    id: 'camp-1',
    accountId: 'acct-1',
    name: 'Spring launch',
    kind: 'bulk',
    provider: 'transactional_api',
    sender: { email: 'news@example.com', name: 'News' },
    stepCount: 1,
    startAt: t0,
    status: 'scheduled',
    ...overrides
  };
}

function step(index: number, overrides: Partial<Step> = {}): Step {
  return { id: `step-${index}`, campaignId: 'camp-1', index, templateId: 'welcome', offsetMs: 0, ...overrides };
}

function recipient(id: string, overrides: Partial<Recipient> = {}): Recipient {
  return {
    id,
    email: `${id}@example.com`,
    name: id.toUpperCase(),
    fields: { first_name: id },
    suppressed: false,
    ...overrides
  };
}

class UnreliableCancelRepository extends MemoryCampaignRepository {
  private failNextCancel = true;

  async updateStatus(campaignId: string, status: CampaignStatus, summary?: CampaignSummary): Promise<Campaign> {
    if (status === 'cancelled' && this.failNextCancel) {
      this.failNextCancel = false;
      throw new Error('database unavailable');
    }
    return super.updateStatus(campaignId, status, summary);
  }
}

type SetupOptions = {
  repository?: MemoryCampaignRepository;
  eventSink?: DeliveryEventSink;
  eventCapacity?: number;
};

function setup(options: SetupOptions = {}) {
  const clock = new ManualClock(t0);
  const repository = options.repository ?? new MemoryCampaignRepository();
  repository.addTemplate({ id: 'welcome', subject: 'Hi {{first_name}}', html: '<p>Hi {{first_name}}</p>' });
  repository.addTemplate({
    id: 'company',
    subject: 'News for {{custom.company}}',
    html: '<p>{{custom.company}}</p>',
    requiredFields: ['company']
  });
  const store = new MemorySendTaskStore();
  const sink = new MemoryDeliveryEventSink();
  const events = new DeliveryEventPublisher(options.eventSink ?? sink, {
    capacity: options.eventCapacity ?? 100,
    offerTimeoutMs: options.eventCapacity ? 10 : 50,
    sinkRetryDelayMs: 5
  });
  const scheduler = new CampaignScheduler({
    repository,
    renderer: new PlaceholderTemplateRenderer(repository),
    store,
    enrollments: new MemoryEnrollmentStore(),
    events,
    sendWindows: { business: businessHours },
    clock
  });

  const complete = async (status: 'sent' | 'failed', at: Date = clock.now()): Promise<SendTask> => {
    const task = await store.pickup(at);
    assert.ok(task);
    if (status === 'sent') {
      return store.settle(task.id, { status: 'sent', attemptCount: 1, providerMessageId: `p-${task.recipientId}`, at }, at);
    }
    return store.settle(
      task.id,
      { status: 'failed', attemptCount: 1, outcome: 'rejected', reason: 'http_400', at },
      at
    );
  };

  return { clock, repository, store, sink, events, scheduler, complete };
}

describe('CampaignScheduler', () => {
  it('starts a due bulk campaign and skips the suppressed recipient', async () => {
    const s = setup();
    s.repository.addCampaign(campaign(), [step(0)], [
      recipient('ana'),
      recipient('bea', { suppressed: true }),
      recipient('caio')
    ]);

    const report = await s.scheduler.tick();

    assert.deepEqual(report, {
      campaignsScanned: 1,
      campaignsStarted: 1,
      campaignsCompleted: 0,
      tasksMaterialized: 2,
      renderFailures: 0
    });
    assert.equal(s.store.size(), 2);
    assert.equal((await s.repository.getCampaign('camp-1'))?.status, 'running');

    const task = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-0', recipientId: 'ana' });
    assert.ok(task);
    assert.equal(task.message.subject, 'Hi ana');
    assert.deepEqual(task.message.to, { email: 'ana@example.com', name: 'ANA' });
    assert.deepEqual(task.message.headers, { 'X-Campaign-Id': 'camp-1', 'X-Campaign-Step': '0' });
    assert.equal(task.dueAt.toISOString(), t0.toISOString());
  });

  it('leaves a campaign alone until its start time', async () => {
    const s = setup();
    s.repository.addCampaign(campaign({ startAt: new Date(t0.getTime() + 60_000) }), [step(0)], [recipient('ana')]);

    const report = await s.scheduler.tick();

    assert.equal(report.tasksMaterialized, 0);
    assert.equal((await s.repository.getCampaign('camp-1'))?.status, 'scheduled');
  });

  it('does not create duplicate tasks on repeated ticks', async () => {
    const s = setup();
    s.repository.addCampaign(campaign(), [step(0)], [recipient('ana'), recipient('caio')]);

    await s.scheduler.tick();
    const second = await s.scheduler.tick();

    assert.equal(second.tasksMaterialized, 0);
    assert.equal(s.store.size(), 2);
  });

  it('completes with failures once every task is terminal', async () => {
    const s = setup();
    s.repository.addCampaign(campaign(), [step(0)], [recipient('ana'), recipient('caio')]);
    await s.scheduler.tick();

    await s.complete('sent');
    await s.complete('failed');
    const report = await s.scheduler.tick();

    assert.equal(report.campaignsCompleted, 1);
    assert.equal((await s.repository.getCampaign('camp-1'))?.status, 'completed');
    assert.deepEqual(s.repository.summaries.get('camp-1'), { sent: 1, failed: 1, withFailures: true });
  });

  it('schedules the next drip step from the completion time inside its send window', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign({ kind: 'drip', stepCount: 2 }),
      [step(0), step(1, { offsetMs: 2 * DAY, sendWindowId: 'business' })],
      [recipient('ana')]
    );
    await s.scheduler.tick();
    assert.equal((await s.scheduler.tick()).tasksMaterialized, 0);

    const completedAt = new Date('2026-03-02T20:00:00.000Z');
    s.clock.set(completedAt);
    await s.complete('sent', completedAt);
    const report = await s.scheduler.tick();

    const next = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-1', recipientId: 'ana' });
    assert.equal(report.tasksMaterialized, 1);
    assert.ok(next);
    assert.equal(next.dueAt.toISOString(), '2026-03-05T09:00:00.000Z');
    assert.equal(next.stepIndex, 1);
  });

  it('anchors each step of a three-step drip on the completion of the step before it', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign({ kind: 'drip', stepCount: 3 }),
      [step(0), step(1, { offsetMs: 2 * DAY }), step(2, { offsetMs: DAY })],
      [recipient('ana')]
    );
    await s.scheduler.tick();

    const firstDone = new Date('2026-03-02T13:00:00.000Z');
    s.clock.set(firstDone);
    await s.complete('sent', firstDone);
    assert.equal((await s.scheduler.tick()).tasksMaterialized, 1);

    const second = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-1', recipientId: 'ana' });
    assert.ok(second);
    assert.equal(second.dueAt.toISOString(), '2026-03-04T13:00:00.000Z');

    const secondDone = new Date('2026-03-04T13:30:00.000Z');
    s.clock.set(secondDone);
    await s.complete('sent', secondDone);
    assert.equal((await s.scheduler.tick()).tasksMaterialized, 1);

    const third = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-2', recipientId: 'ana' });
    assert.ok(third);
    assert.equal(third.dueAt.toISOString(), '2026-03-05T13:30:00.000Z');
    assert.equal(third.stepIndex, 2);

    const thirdDone = new Date('2026-03-05T14:00:00.000Z');
    s.clock.set(thirdDone);
    await s.complete('sent', thirdDone);
    assert.equal((await s.scheduler.tick()).campaignsCompleted, 1);
    assert.deepEqual(s.repository.summaries.get('camp-1'), { sent: 3, failed: 0, withFailures: false });
  });

  it('advances a drip enrollment after a failed step', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign({ kind: 'drip', stepCount: 2 }),
      [step(0), step(1, { offsetMs: DAY })],
      [recipient('ana')]
    );
    await s.scheduler.tick();
    await s.complete('failed');
    await s.scheduler.tick();

    const next = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-1', recipientId: 'ana' });
    assert.ok(next);
    assert.equal(next.dueAt.getTime(), t0.getTime() + DAY);
  });

  it('stops materializing while paused and lets queued tasks drain', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign({ kind: 'drip', stepCount: 2 }),
      [step(0), step(1, { offsetMs: 0 })],
      [recipient('ana')]
    );
    await s.scheduler.tick();

    await s.scheduler.pause('camp-1');
    await s.complete('sent');
    assert.equal((await s.scheduler.tick()).tasksMaterialized, 0);
    assert.equal(s.store.size(), 1);

    await s.scheduler.resume('camp-1');
    assert.equal((await s.scheduler.tick()).tasksMaterialized, 1);
  });

  it('cancels pending tasks and leaves in-flight ones to finish', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign(),
      [step(0)],
      Array.from({ length: 12 }, (_, i) => recipient(`r${String(i).padStart(2, '0')}`))
    );
    await s.scheduler.tick();
    const flying = [await s.store.pickup(t0), await s.store.pickup(t0)];

    const cancelled = await s.scheduler.cancel('camp-1');
    await s.events.flush();

    assert.equal(cancelled, 10);
    assert.equal((await s.repository.getCampaign('camp-1'))?.status, 'cancelled');
    assert.equal(s.sink.events.length, 10);
    assert.ok(s.sink.events.every((event) => event.outcome === 'cancelled' && event.reason === 'campaign_cancelled'));
    assert.equal(await s.store.countByStatus('in_flight'), 2);

    const [first, second] = flying;
    assert.ok(first && second);
    const sent = await s.store.settle(first.id, { status: 'sent', attemptCount: 1, providerMessageId: 'p', at: t0 }, t0);
    const retried = await s.store.settle(
      second.id,
      { status: 'deferred', attemptCount: 1, dueAt: t0, reason: 'http_503' },
      t0
    );
    assert.equal(sent.status, 'sent');
    assert.equal(retried.failureOutcome, 'cancelled');

    assert.equal((await s.scheduler.tick()).campaignsScanned, 0);
  });

  it('keeps scheduling a campaign whose cancellation could not be stored', async () => {
    const s = setup({ repository: new UnreliableCancelRepository() });
    s.repository.addCampaign(campaign(), [step(0)], [recipient('ana')]);
    await s.scheduler.tick();

    await assert.rejects(s.scheduler.cancel('camp-1'), /database unavailable/);
    await s.complete('sent');
    await s.scheduler.tick();
    const report = await s.scheduler.tick();

    assert.equal(report.campaignsScanned, 0);
    assert.equal((await s.repository.getCampaign('camp-1'))?.status, 'completed');
    assert.deepEqual(s.repository.summaries.get('camp-1'), { sent: 1, failed: 0, withFailures: false });
  });

  it('delivers every cancellation event when the event buffer is full', async () => {
    const sink = new GatedSink();
    const s = setup({ eventSink: sink, eventCapacity: 1 });
    s.repository.addCampaign(campaign(), [step(0)], [recipient('ana'), recipient('bea'), recipient('caio')]);
    await s.scheduler.tick();

    assert.equal(await s.scheduler.cancel('camp-1'), 3);
    assert.equal(s.events.retained, 2);

    sink.open();
    await s.events.flush();

    assert.deepEqual(
      sink.recorded.map((event) => [event.outcome, event.task.recipientId]).sort(),
      [
        ['cancelled', 'ana'],
        ['cancelled', 'bea'],
        ['cancelled', 'caio']
      ]
    );
  });

  it('records a render failure without creating a task', async () => {
    const s = setup();
    s.repository.addCampaign(
      campaign({ id: 'camp-1' }),
      [step(0, { templateId: 'company' })],
      [recipient('ana', { fields: { company: 'Acme & Co' } }), recipient('caio')]
    );

    const report = await s.scheduler.tick();
    await s.events.flush();

    assert.equal(report.tasksMaterialized, 1);
    assert.equal(report.renderFailures, 1);
    assert.equal(s.store.size(), 1);
    assert.deepEqual(
      s.sink.events.map((event) => [event.outcome, event.taskId, event.task.recipientId, event.reason]),
      [['permanent_failure', null, 'caio', 'render_error:missing_field:company']]
    );

    const task = await s.store.findByKey({ campaignId: 'camp-1', stepId: 'step-0', recipientId: 'ana' });
    assert.equal(task?.message.subject, 'News for Acme & Co');
    assert.equal(task?.message.html, '<p>Acme &amp; Co</p>');

    await s.complete('sent');
    await s.scheduler.tick();
    assert.deepEqual(s.repository.summaries.get('camp-1'), { sent: 1, failed: 1, withFailures: true });
  });

  it('reports an invalid campaign and keeps scanning the others', async () => {
    const s = setup();
    s.repository.addCampaign(campaign({ id: 'bad', stepCount: 2 }), [step(0), step(1)], [recipient('ana')]);
    s.repository.addCampaign(
      campaign({ id: 'drip', kind: 'drip', stepCount: 1 }),
      [step(0, { campaignId: 'drip', sendWindowId: 'nights' })],
      [recipient('ana')]
    );
    s.repository.addCampaign(campaign({ id: 'good' }), [step(0, { campaignId: 'good' })], [recipient('ana')]);

    const report = await s.scheduler.tick();

    assert.equal(report.tasksMaterialized, 1);
    assert.deepEqual(
      s.repository.problems.map((problem) => [problem.campaignId, problem.message]),
      [
        ['bad', 'bulk_campaign_requires_one_step'],
        ['drip', 'unknown_send_window:nights']
      ]
    );
  });
});
