/**
 * Change Governance Service
 *
 * fetch campaign state → enforce guardrails → on approval store the pending
 * change and announce it. Stop-loss alerts are surfaced whatever the decision.
 */

import { ChangeRequest } from '../../types/ChangeRequestTypes';
import { CampaignState } from '../../types/CampaignStateTypes';
import { GuardrailVerdict, isApproved } from '../../types/GuardrailTypes';
import { IPendingChangeStore, PendingChangeRecord } from '../../types/PendingChangeTypes';
import { ICampaignDataProvider } from '../../types/CollaboratorTypes';
import { INotificationSink } from '../../types/NotificationTypes';
import { PendingChangeNotFoundError } from '../../types/GuardrailErrors';
import { GuardrailEngine } from '../guardrails/GuardrailEngine';
import { Logger } from '../core/Logger';

export interface SubmitChangeResult {
  verdict: GuardrailVerdict;
  /** Present only when the change was approved and scheduled. */
  pending_change?: PendingChangeRecord;
}

export interface CancelChangeResult {
  change_id: string;
  cancelled: boolean;
}

export class ChangeGovernanceService {
  constructor(
    private engine: GuardrailEngine,
    private dataProvider: ICampaignDataProvider,
    private store: IPendingChangeStore,
    private notifications: INotificationSink,
    private logger: Logger
  ) {}

  async submitChange(request: ChangeRequest): Promise<SubmitChangeResult> {
    const log = this.logger.child({ campaignId: request.campaign_id });

    const state = await this.fetchState(request, log);
    const verdict = this.engine.enforce(request, state);

    if (verdict.alerts.length > 0) {
      await this.notifications.notify('STOP_LOSS', {
        campaign_id: request.campaign_id,
        alerts: verdict.alerts,
      });
    }

    if (!isApproved(verdict)) {
      log.info('Change request rejected', {
        kind: request.kind,
        decision: verdict.decision,
        reasons: verdict.reasons,
      });
      return { verdict };
    }

    const pending = await this.store.add(request, verdict);
    await this.notifications.notify('PLANNED_CHANGE', {
      campaign_id: request.campaign_id,
      change_id: pending.change_id,
      change_request: request,
      execute_after: pending.execute_after,
    });

    log.info('Change request approved and scheduled', {
      kind: request.kind,
      changeId: pending.change_id,
      execute_after: pending.execute_after,
    });
    return { verdict, pending_change: pending };
  }

  private async fetchState(request: ChangeRequest, log: Logger): Promise<CampaignState> {
    try {
      return await this.dataProvider.fetchState(request.campaign_id);
    } catch (error) {
      log.error('Failed to fetch campaign state', {
        kind: request.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Cancel a change inside its change window.
   * @throws PendingChangeNotFoundError
   */
  async cancelChange(changeId: string, reason?: string): Promise<CancelChangeResult> {
    const existing = await this.store.get(changeId);
    if (!existing) {
      throw new PendingChangeNotFoundError(changeId);
    }
    if (existing.status !== 'PENDING') {
      this.logger.info('Change not cancelled; already terminal', { changeId, status: existing.status });
      return { change_id: changeId, cancelled: false };
    }

    const cancelled = await this.store.cancel(changeId, reason, existing.version);
    return { change_id: changeId, cancelled };
  }
}
