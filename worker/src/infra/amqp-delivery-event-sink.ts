import { ChannelModel, ConfirmChannel, connect } from 'amqplib';
import { DeliveryEvent } from '../domain/types';
import { DeliveryEventSink } from '../core/delivery-events';
import { Logger, silentLogger } from './logger';

export type DeliveryEventMessage = {
  eventId: string;
  taskId: string | null;
  campaignId: string;
  stepId: string;
  recipientId: string;
  accountId: string;
  provider: string;
  outcome: string;
  occurredAt: string;
  attemptCount: number;
  providerMessageId: string | null;
  reason: string | null;
};

export function toDeliveryEventMessage(event: DeliveryEvent): DeliveryEventMessage {
  return {
    eventId: event.id,
    taskId: event.taskId,
    campaignId: event.task.campaignId,
    stepId: event.task.stepId,
    recipientId: event.task.recipientId,
    accountId: event.accountId,
    provider: event.provider,
    outcome: event.outcome,
    occurredAt: event.occurredAt.toISOString(),
    attemptCount: event.attemptCount,
    providerMessageId: event.providerMessageId,
    reason: event.reason
  };
}

/**
 * Publishes delivery events to a durable queue on a confirm channel, so
 * `record` resolves only once the broker has taken the message.
 */
export class AmqpDeliveryEventSink implements DeliveryEventSink {
  private connection: ChannelModel | null = null;
  private channel: ConfirmChannel | null = null;

  constructor(
    private readonly url: string,
    private readonly queue: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async record(event: DeliveryEvent): Promise<void> {
    const channel = await this.getChannel();
    channel.sendToQueue(this.queue, Buffer.from(JSON.stringify(toDeliveryEventMessage(event))), {
      persistent: true,
      contentType: 'application/json',
      messageId: event.id,
      type: event.outcome,
      timestamp: Math.floor(event.occurredAt.getTime() / 1000)
    });
    await channel.waitForConfirms();
  }

  private async getChannel(): Promise<ConfirmChannel> {
    if (this.channel) {
      return this.channel;
    }

    const connection = this.connection ?? (await this.connect());
    const channel = await connection.createConfirmChannel();
    await channel.assertQueue(this.queue, { durable: true });

    channel.on('close', () => {
      if (this.channel === channel) {
        this.channel = null;
      }
    });
    channel.on('error', (error: Error) => {
      this.logger.warn({ type: 'amqp_channel_error', queue: this.queue, reason: error.message }, 'AmqpDeliveryEventSink');
    });

    this.channel = channel;
    return channel;
  }

  private async connect(): Promise<ChannelModel> {
    const connection = await connect(this.url);
    connection.on('close', () => {
      if (this.connection === connection) {
        this.connection = null;
        this.channel = null;
      }
    });
    connection.on('error', (error: Error) => {
      this.logger.warn({ type: 'amqp_connection_error', reason: error.message }, 'AmqpDeliveryEventSink');
    });
    this.connection = connection;
    return connection;
  }

  async close(): Promise<void> {
    if (this.channel) {
      await this.channel.close();
      this.channel = null;
    }

    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }
}
