/**
 * Phase Monitor Service
 *
 * Daily per-campaign pass: load the phase snapshot, check eligibility and
 * timeline, and notify on advance or lag.
 */

import { IPhaseSnapshotProvider } from '../../types/CollaboratorTypes';
import { INotificationSink, NotificationKind } from '../../types/NotificationTypes';
import {
  CampaignPhase,
  NEXT_PHASE,
  PhaseEligibilityResult,
  PhaseProgressResult,
} from '../../types/PhaseTypes';
import { InvalidCampaignSnapshotError } from '../../types/GuardrailErrors';
import { parseCalendarDate } from '../../utils/date-utils';
import { PhaseStateMachine } from './PhaseStateMachine';
import { Logger } from '../core/Logger';

export interface PhaseMonitorReport {
  campaign_id: string;
  phase: CampaignPhase;
  eligibility: PhaseEligibilityResult;
  progress: PhaseProgressResult;
  /** Kinds whose notification was delivered to the sink. */
  notifications_sent: NotificationKind[];
}

export interface PhaseMonitorFailure {
  campaign_id: string;
  error: string;
}

export interface PhaseMonitorRunResult {
  reports: PhaseMonitorReport[];
  failures: PhaseMonitorFailure[];
}

export class PhaseMonitorService {
  constructor(
    private snapshotProvider: IPhaseSnapshotProvider,
    private stateMachine: PhaseStateMachine,
    private notifications: INotificationSink,
    private logger: Logger,
    private clock: () => Date = () => new Date()
  ) {}

  async monitorCampaign(campaignId: string): Promise<PhaseMonitorReport> {
    const snapshot = await this.snapshotProvider.fetchPhaseSnapshot(campaignId);
    const startDate = parseCalendarDate(snapshot.phase_started_at);
    if (startDate === null) {
      throw new InvalidCampaignSnapshotError(campaignId, 'PHASE', [
        `phase_started_at is not a calendar date: ${snapshot.phase_started_at}`,
      ]);
    }
    const eligibility = this.stateMachine.checkEligibility(snapshot.metrics, snapshot.phase);
    const progress = this.stateMachine.checkProgress({
      start_date: startDate,
      today: this.clock(),
      phase: snapshot.phase,
      eligibility,
    });

    const sent: NotificationKind[] = [];
    const nextPhase = NEXT_PHASE[snapshot.phase];
    if (eligibility.eligible_for_next && nextPhase !== null) {
      const delivered = await this.notifications.notify('PHASE_ADVANCE', {
        campaign_id: campaignId,
        current_phase: snapshot.phase,
        next_phase: nextPhase,
        recommended_action: eligibility.recommended_action,
      });
      if (delivered) {
        sent.push('PHASE_ADVANCE');
      }
    }

    if (progress.lag_alert) {
      const delivered = await this.notifications.notify('CRITICAL_LAG', {
        campaign_id: campaignId,
        phase: snapshot.phase,
        days_in_phase: progress.days_in_phase,
        max_days: progress.max_days,
        blocking_factors: eligibility.details.blocking_factors,
        message: progress.message,
      });
      if (delivered) {
        sent.push('CRITICAL_LAG');
      }
    } else if (progress.lagging) {
      const delivered = await this.notifications.notify('PHASE_LAG', {
        campaign_id: campaignId,
        phase: snapshot.phase,
        days_in_phase: progress.days_in_phase,
        expected_days: progress.expected_days,
        status: progress.status,
        message: progress.message,
      });
      if (delivered) {
        sent.push('PHASE_LAG');
      }
    }

    this.logger.info('Phase checked', {
      campaignId,
      phase: snapshot.phase,
      eligible_for_next: eligibility.eligible_for_next,
      status: progress.status,
      days_in_phase: progress.days_in_phase,
    });

    return {
      campaign_id: campaignId,
      phase: snapshot.phase,
      eligibility,
      progress,
      notifications_sent: sent,
    };
  }

  /**
   * One campaign failing does not stop the others; failures are returned.
   */
  async monitorCampaigns(campaignIds: string[]): Promise<PhaseMonitorRunResult> {
    const reports: PhaseMonitorReport[] = [];
    const failures: PhaseMonitorFailure[] = [];
    for (const campaignId of campaignIds) {
      try {
        reports.push(await this.monitorCampaign(campaignId));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Phase check failed', { campaignId, error: message });
        failures.push({ campaign_id: campaignId, error: message });
      }
    }
    return { reports, failures };
  }
}
