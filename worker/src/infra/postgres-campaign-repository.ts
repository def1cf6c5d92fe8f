import { assertTransition } from '../domain/campaign-status';
import { ValidationError } from '../domain/errors';
import {
  Campaign,
  CampaignKind,
  CampaignStatus,
  CampaignSummary,
  ProviderKind,
  Recipient,
  Sender,
  Step
} from '../domain/types';
import { CampaignRepository } from '../core/campaign-repository';
import { EmailTemplate, TemplateSource } from '../core/template-renderer';
import { DbClient } from './db-client';

type CampaignRow = {
  id: string;
  account_id: string;
  name: string;
  kind: CampaignKind;
  provider: ProviderKind;
  sender_email: string | null;
  sender_name: string | null;
  reply_to: string | null;
  step_count: number;
  start_at: Date;
  status: CampaignStatus;
};

type StepRow = {
  id: string;
  campaign_id: string;
  step_index: number;
  template_id: string;
  offset_ms: string;
  send_window_id: string | null;
};

type RecipientRow = {
  id: string;
  email: string;
  name: string | null;
  fields_jsonb: Record<string, string> | null;
  suppressed: boolean;
};

type TemplateRow = {
  id: string;
  subject: string;
  html: string;
  body_text: string | null;
  required_fields: string[];
};

const CAMPAIGN_COLUMNS =
  'id, account_id, name, kind, provider, sender_email, sender_name, reply_to, step_count, start_at, status';

/** Campaigns without their own sender fall back to `defaultSender`. */
export class PostgresCampaignRepository implements CampaignRepository, TemplateSource {
  constructor(
    private readonly db: DbClient,
    private readonly defaultSender: Sender
  ) {}

  async getActiveCampaigns(): Promise<Campaign[]> {
    const result = await this.db.query<CampaignRow>(
      `select ${CAMPAIGN_COLUMNS} from campaigns
       where status in ('scheduled', 'running', 'paused')
       order by start_at`
    );
    return result.rows.map((row) => this.toCampaign(row));
  }

  async getCampaign(campaignId: string): Promise<Campaign | null> {
    const result = await this.db.query<CampaignRow>(`select ${CAMPAIGN_COLUMNS} from campaigns where id = $1`, [
      campaignId
    ]);
    return result.rows[0] ? this.toCampaign(result.rows[0]) : null;
  }

  async getRecipients(campaignId: string): Promise<Recipient[]> {
    const result = await this.db.query<RecipientRow>(
      `select id, email, name, fields_jsonb, suppressed
       from campaign_recipients
       where campaign_id = $1 and suppressed = false
       order by id`,
      [campaignId]
    );

    return result.rows.map((row) => ({
      id: row.id,
      email: row.email,
      name: row.name ?? undefined,
      fields: row.fields_jsonb ?? {},
      suppressed: row.suppressed
    }));
  }

  async getStep(campaignId: string, index: number): Promise<Step | null> {
    const result = await this.db.query<StepRow>(
      `select id, campaign_id, step_index, template_id, offset_ms, send_window_id
       from campaign_steps
       where campaign_id = $1 and step_index = $2`,
      [campaignId, index]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      campaignId: row.campaign_id,
      index: row.step_index,
      templateId: row.template_id,
      offsetMs: Number(row.offset_ms),
      sendWindowId: row.send_window_id ?? undefined
    };
  }

  async updateStatus(campaignId: string, status: CampaignStatus, summary?: CampaignSummary): Promise<Campaign> {
    return this.db.transaction(async (client) => {
      const current = await client.query<CampaignRow>(
        `select ${CAMPAIGN_COLUMNS} from campaigns where id = $1 for update`,
        [campaignId]
      );
      if (!current.rows[0]) {
        throw new ValidationError('campaign_not_found', campaignId);
      }
      assertTransition(campaignId, current.rows[0].status, status);

      const updated = await client.query<CampaignRow>(
        `update campaigns
         set status = $2,
             summary_jsonb = coalesce($3::jsonb, summary_jsonb),
             updated_at = now()
         where id = $1
         returning ${CAMPAIGN_COLUMNS}`,
        [campaignId, status, summary ? JSON.stringify(summary) : null]
      );
      return this.toCampaign(updated.rows[0] ?? current.rows[0]);
    });
  }

  async reportProblem(campaignId: string, message: string): Promise<void> {
    await this.db.query('insert into campaign_problems (campaign_id, message) values ($1, $2)', [campaignId, message]);
  }

  async getTemplate(templateId: string): Promise<EmailTemplate | null> {
    const result = await this.db.query<TemplateRow>(
      'select id, subject, html, body_text, required_fields from email_templates where id = $1',
      [templateId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      subject: row.subject,
      html: row.html,
      text: row.body_text ?? undefined,
      requiredFields: row.required_fields
    };
  }

  private toCampaign(row: CampaignRow): Campaign {
    return {
      id: row.id,
      accountId: row.account_id,
      name: row.name,
      kind: row.kind,
      provider: row.provider,
      sender: {
        email: row.sender_email ?? this.defaultSender.email,
        name: row.sender_name ?? this.defaultSender.name,
        replyTo: row.reply_to ?? undefined
      },
      stepCount: row.step_count,
      startAt: row.start_at,
      status: row.status
    };
  }
}
