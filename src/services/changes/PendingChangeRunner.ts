/**
 * Pending Change Runner
 *
 * Executes PENDING changes whose change window has elapsed. Each change is
 * re-validated against fresh campaign state first (on by default); one that
 * no longer passes is cancelled with the rejection reasons.
 *
 * Changes are processed one at a time. Every transition carries the version
 * read from the store, so a change cancelled mid-run is left alone.
 */

import { IPendingChangeStore, PendingChangeRecord } from '../../types/PendingChangeTypes';
import { ChangeExecutionResult, IChangeExecutor, ICampaignDataProvider } from '../../types/CollaboratorTypes';
import { INotificationSink } from '../../types/NotificationTypes';
import { isApproved } from '../../types/GuardrailTypes';
import { GuardrailEngine } from '../guardrails/GuardrailEngine';
import { Logger } from '../core/Logger';

export interface PendingChangeRunnerOptions {
  /** Re-run the guardrails against current state before executing. Default true. */
  revalidate?: boolean;
}

export type ChangeRunStatus = 'EXECUTED' | 'FAILED' | 'CANCELLED' | 'SKIPPED';

export interface ChangeRunOutcome {
  change_id: string;
  campaign_id: string;
  status: ChangeRunStatus;
  reason?: string;
  execution_ref?: string;
}

export interface PendingChangeRunReport {
  due: number;
  executed: number;
  failed: number;
  cancelled: number;
  skipped: number;
  outcomes: ChangeRunOutcome[];
}

type RevalidationResult =
  | { outcome: 'PASSED' }
  | { outcome: 'REJECTED'; reasons: string[] }
  | { outcome: 'ERROR'; error: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PendingChangeRunner {
  private readonly revalidate: boolean;

  constructor(
    private store: IPendingChangeStore,
    private executor: IChangeExecutor,
    private engine: GuardrailEngine,
    private dataProvider: ICampaignDataProvider,
    private notifications: INotificationSink,
    private logger: Logger,
    options: PendingChangeRunnerOptions = {},
    private clock: () => Date = () => new Date()
  ) {
    this.revalidate = options.revalidate ?? true;
  }

  async runDue(): Promise<PendingChangeRunReport> {
    const due = await this.store.listDue(this.clock());
    const outcomes: ChangeRunOutcome[] = [];
    for (const record of due) {
      outcomes.push(await this.processChange(record));
    }

    const count = (status: ChangeRunStatus): number => outcomes.filter((o) => o.status === status).length;
    const report: PendingChangeRunReport = {
      due: due.length,
      executed: count('EXECUTED'),
      failed: count('FAILED'),
      cancelled: count('CANCELLED'),
      skipped: count('SKIPPED'),
      outcomes,
    };
    this.logger.info('Pending change run complete', {
      due: report.due,
      executed: report.executed,
      failed: report.failed,
      cancelled: report.cancelled,
      skipped: report.skipped,
    });
    return report;
  }

  async processChange(record: PendingChangeRecord): Promise<ChangeRunOutcome> {
    const log = this.logger.child({ campaignId: record.campaign_id, changeId: record.change_id });
    const base = { change_id: record.change_id, campaign_id: record.campaign_id };

    if (this.revalidate) {
      const revalidation = await this.revalidateChange(record);
      if (revalidation.outcome === 'ERROR') {
        log.error('Re-validation could not run; change left PENDING', { error: revalidation.error });
        return { ...base, status: 'SKIPPED', reason: `Re-validation failed to run: ${revalidation.error}` };
      }
      if (revalidation.outcome === 'REJECTED') {
        const rejection = revalidation.reasons.join('; ');
        const reason = `Re-validation rejected change: ${rejection}`;
        const cancelled = await this.store.cancel(record.change_id, reason, record.version);
        log.warn('Change cancelled at execution time', { reason, cancelled });
        return cancelled
          ? { ...base, status: 'CANCELLED', reason }
          : { ...base, status: 'SKIPPED', reason: 'Change no longer PENDING' };
      }
    }

    const result = await this.executeChange(record);
    if (result.success) {
      const marked = await this.store.markExecuted(record.change_id, result.execution_ref, record.version);
      if (!marked) {
        log.error('Change executed but no longer PENDING in store', { execution_ref: result.execution_ref });
        return { ...base, status: 'SKIPPED', reason: 'Change no longer PENDING', execution_ref: result.execution_ref };
      }
      log.info('Change executed', { execution_ref: result.execution_ref });
      return { ...base, status: 'EXECUTED', execution_ref: result.execution_ref };
    }

    const marked = await this.store.markFailed(record.change_id, result.error, record.version);
    if (!marked) {
      return { ...base, status: 'SKIPPED', reason: 'Change no longer PENDING' };
    }
    log.error('Change execution failed', { error: result.error });
    await this.notifications.notify('CHANGE_FAILED', {
      campaign_id: record.campaign_id,
      change_id: record.change_id,
      reason: result.error,
    });
    return { ...base, status: 'FAILED', reason: result.error };
  }

  private async revalidateChange(record: PendingChangeRecord): Promise<RevalidationResult> {
    try {
      const state = await this.dataProvider.fetchState(record.campaign_id);
      const verdict = this.engine.enforce(record.change_request, state);
      return isApproved(verdict) ? { outcome: 'PASSED' } : { outcome: 'REJECTED', reasons: verdict.reasons };
    } catch (error) {
      return { outcome: 'ERROR', error: errorMessage(error) };
    }
  }

  /** Executor errors become a failed result. */
  private async executeChange(record: PendingChangeRecord): Promise<ChangeExecutionResult> {
    try {
      return await this.executor.execute(record);
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
