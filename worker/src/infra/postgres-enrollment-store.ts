import { Enrollment, EnrollmentState } from '../domain/types';
import { EnrollmentStore } from '../core/enrollment-store';
import { DbClient } from './db-client';

type EnrollmentRow = {
  campaign_id: string;
  recipient_id: string;
  step_index: number;
  state: EnrollmentState;
  anchor_at: Date;
  task_id: string | null;
  sent_steps: number;
  failed_steps: number;
  updated_at: Date;
};

export class PostgresEnrollmentStore implements EnrollmentStore {
  constructor(private readonly db: DbClient) {}

  async listByCampaign(campaignId: string): Promise<Enrollment[]> {
    const result = await this.db.query<EnrollmentRow>(
      `select campaign_id, recipient_id, step_index, state, anchor_at, task_id, sent_steps, failed_steps, updated_at
       from campaign_enrollments
       where campaign_id = $1`,
      [campaignId]
    );

    return result.rows.map((row) => ({
      campaignId: row.campaign_id,
      recipientId: row.recipient_id,
      stepIndex: row.step_index,
      state: row.state,
      anchorAt: row.anchor_at,
      taskId: row.task_id,
      sentSteps: row.sent_steps,
      failedSteps: row.failed_steps,
      updatedAt: row.updated_at
    }));
  }

  async save(enrollment: Enrollment): Promise<void> {
    await this.db.query(
      `insert into campaign_enrollments (
         campaign_id, recipient_id, step_index, state, anchor_at, task_id, sent_steps, failed_steps, updated_at
       ) values ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       on conflict (campaign_id, recipient_id)
       do update set step_index = excluded.step_index,
                     state = excluded.state,
                     anchor_at = excluded.anchor_at,
                     task_id = excluded.task_id,
                     sent_steps = excluded.sent_steps,
                     failed_steps = excluded.failed_steps,
                     updated_at = excluded.updated_at`,
      [
        enrollment.campaignId,
        enrollment.recipientId,
        enrollment.stepIndex,
        enrollment.state,
        enrollment.anchorAt,
        enrollment.taskId,
        enrollment.sentSteps,
        enrollment.failedSteps,
        enrollment.updatedAt
      ]
    );
  }
}
