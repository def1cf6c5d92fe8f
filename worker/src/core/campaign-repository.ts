import { ACTIVE_CAMPAIGN_STATUSES, assertTransition } from '../domain/campaign-status';
import { ValidationError } from '../domain/errors';
import { Campaign, CampaignStatus, CampaignSummary, Recipient, Step } from '../domain/types';
import { EmailTemplate, TemplateSource } from './template-renderer';

export interface CampaignRepository {
  getActiveCampaigns(): Promise<Campaign[]>;
  getCampaign(campaignId: string): Promise<Campaign | null>;
  getRecipients(campaignId: string): Promise<Recipient[]>;
  getStep(campaignId: string, index: number): Promise<Step | null>;
  updateStatus(campaignId: string, status: CampaignStatus, summary?: CampaignSummary): Promise<Campaign>;
  reportProblem(campaignId: string, message: string): Promise<void>;
}

export type CampaignProblem = { campaignId: string; message: string; at: Date };

export class MemoryCampaignRepository implements CampaignRepository, TemplateSource {
  private readonly campaigns = new Map<string, Campaign>();
  private readonly steps = new Map<string, Step[]>();
  private readonly recipients = new Map<string, Recipient[]>();
  private readonly templates = new Map<string, EmailTemplate>();
  readonly summaries = new Map<string, CampaignSummary>();
  readonly problems: CampaignProblem[] = [];

  addCampaign(campaign: Campaign, steps: Step[], recipients: Recipient[]): void {
    this.campaigns.set(campaign.id, { ...campaign });
    this.steps.set(campaign.id, [...steps].sort((a, b) => a.index - b.index));
    this.recipients.set(campaign.id, [...recipients]);
  }

  addTemplate(template: EmailTemplate): void {
    this.templates.set(template.id, template);
  }

  replaceStep(step: Step): void {
    const steps = (this.steps.get(step.campaignId) ?? []).filter((item) => item.index !== step.index);
    this.steps.set(step.campaignId, [...steps, step].sort((a, b) => a.index - b.index));
  }

  async getActiveCampaigns(): Promise<Campaign[]> {
    return [...this.campaigns.values()]
      .filter((campaign) => ACTIVE_CAMPAIGN_STATUSES.includes(campaign.status))
      .map((campaign) => ({ ...campaign }));
  }

  async getCampaign(campaignId: string): Promise<Campaign | null> {
    const campaign = this.campaigns.get(campaignId);
    return campaign ? { ...campaign } : null;
  }

  async getRecipients(campaignId: string): Promise<Recipient[]> {
    return (this.recipients.get(campaignId) ?? []).filter((recipient) => !recipient.suppressed);
  }

  async getStep(campaignId: string, index: number): Promise<Step | null> {
    return this.steps.get(campaignId)?.find((step) => step.index === index) ?? null;
  }

  async updateStatus(campaignId: string, status: CampaignStatus, summary?: CampaignSummary): Promise<Campaign> {
    const campaign = this.campaigns.get(campaignId);
    if (!campaign) {
      throw new ValidationError('campaign_not_found', campaignId);
    }
    assertTransition(campaignId, campaign.status, status);
    campaign.status = status;
    if (summary) {
      this.summaries.set(campaignId, summary);
    }
    return { ...campaign };
  }

  async reportProblem(campaignId: string, message: string): Promise<void> {
    this.problems.push({ campaignId, message, at: new Date() });
  }

  async getTemplate(templateId: string): Promise<EmailTemplate | null> {
    return this.templates.get(templateId) ?? null;
  }
}
