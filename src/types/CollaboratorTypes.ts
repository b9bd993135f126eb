/**
 * Collaborators the governance services call into.
 */

import type { CampaignState } from './CampaignStateTypes';
import type { PhaseSnapshot } from './PhaseTypes';
import type { PendingChangeRecord } from './PendingChangeTypes';

export interface ICampaignDataProvider {
  fetchState(campaignId: string): Promise<CampaignState>;
}

export interface IPhaseSnapshotProvider {
  fetchPhaseSnapshot(campaignId: string): Promise<PhaseSnapshot>;
}

export type ChangeExecutionResult =
  | { success: true; execution_ref: string }
  | { success: false; error: string };

export interface IChangeExecutor {
  execute(record: PendingChangeRecord): Promise<ChangeExecutionResult>;
}
