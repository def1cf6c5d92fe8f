import { Enrollment } from '../domain/types';

/**
 * Per campaign-recipient progress. The scheduler re-reads this on every scan,
 * so a restarted worker resumes from whatever was last saved.
 */
export interface EnrollmentStore {
  listByCampaign(campaignId: string): Promise<Enrollment[]>;
  save(enrollment: Enrollment): Promise<void>;
}

export class MemoryEnrollmentStore implements EnrollmentStore {
  private readonly byCampaign = new Map<string, Map<string, Enrollment>>();

  async listByCampaign(campaignId: string): Promise<Enrollment[]> {
    return [...(this.byCampaign.get(campaignId)?.values() ?? [])].map((enrollment) => ({ ...enrollment }));
  }

  async save(enrollment: Enrollment): Promise<void> {
    let campaign = this.byCampaign.get(enrollment.campaignId);
    if (!campaign) {
      campaign = new Map();
      this.byCampaign.set(enrollment.campaignId, campaign);
    }
    campaign.set(enrollment.recipientId, { ...enrollment });
  }
}
