/**
 * Notification kinds and their payloads. Delivery (email, Slack) happens
 * downstream of the sink.
 */

import type { ChangeRequest } from './ChangeRequestTypes';
import type { CampaignPhase, PhaseProgressStatus } from './PhaseTypes';

export type NotificationKind =
  | 'PLANNED_CHANGE'
  | 'STOP_LOSS'
  | 'PHASE_ADVANCE'
  | 'PHASE_LAG'
  | 'CRITICAL_LAG'
  | 'CHANGE_FAILED';

export interface NotificationPayloadMap {
  PLANNED_CHANGE: {
    campaign_id: string;
    change_id: string;
    change_request: ChangeRequest;
    execute_after: string;
  };
  STOP_LOSS: {
    campaign_id: string;
    alerts: string[];
  };
  PHASE_ADVANCE: {
    campaign_id: string;
    current_phase: CampaignPhase;
    next_phase: CampaignPhase;
    recommended_action: string;
  };
  PHASE_LAG: {
    campaign_id: string;
    phase: CampaignPhase;
    days_in_phase: number;
    expected_days: number;
    status: PhaseProgressStatus;
    message: string;
  };
  CRITICAL_LAG: {
    campaign_id: string;
    phase: CampaignPhase;
    days_in_phase: number;
    max_days: number;
    blocking_factors: string[];
    message: string;
  };
  CHANGE_FAILED: {
    campaign_id: string;
    change_id: string;
    reason: string;
  };
}

export interface INotificationSink {
  /** Best-effort: resolves false on delivery failure, never rejects. */
  notify<K extends NotificationKind>(kind: K, payload: NotificationPayloadMap[K]): Promise<boolean>;
}
