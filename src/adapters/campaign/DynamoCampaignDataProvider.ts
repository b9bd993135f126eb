/**
 * Reads campaign snapshots written by the ingestion job.
 *
 * Table key: campaign_id (PK) + snapshot_type (SK), where snapshot_type is
 * CAMPAIGN_STATE or PHASE. The snapshot itself sits under `data`.
 */

import { DynamoDBDocumentClient, GetCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { CampaignState } from '../../types/CampaignStateTypes';
import { PhaseSnapshot } from '../../types/PhaseTypes';
import { ICampaignDataProvider, IPhaseSnapshotProvider } from '../../types/CollaboratorTypes';
import { CampaignStateSchema, PhaseSnapshotSchema, formatZodIssues } from '../../types/CampaignSchemas';
import { CampaignSnapshotNotFoundError, InvalidCampaignSnapshotError } from '../../types/GuardrailErrors';
import { Logger } from '../../services/core/Logger';

export type SnapshotType = 'CAMPAIGN_STATE' | 'PHASE';

export class DynamoCampaignDataProvider implements ICampaignDataProvider, IPhaseSnapshotProvider {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private logger: Logger
  ) {}

  async fetchState(campaignId: string): Promise<CampaignState> {
    return this.fetchSnapshot(campaignId, 'CAMPAIGN_STATE', CampaignStateSchema);
  }

  async fetchPhaseSnapshot(campaignId: string): Promise<PhaseSnapshot> {
    return this.fetchSnapshot(campaignId, 'PHASE', PhaseSnapshotSchema);
  }

  private async fetchSnapshot<T>(
    campaignId: string,
    snapshotType: SnapshotType,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { campaign_id: campaignId, snapshot_type: snapshotType },
      })
    );
    if (!result.Item) {
      throw new CampaignSnapshotNotFoundError(campaignId, snapshotType);
    }

    const parsed = schema.safeParse(result.Item.data);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      this.logger.error('Invalid campaign snapshot', { campaignId, snapshotType, issues });
      throw new InvalidCampaignSnapshotError(campaignId, snapshotType, issues);
    }

    this.logger.debug('Campaign snapshot loaded', { campaignId, snapshotType, captured_at: result.Item.captured_at });
    return parsed.data;
  }
}
