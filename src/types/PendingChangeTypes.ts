/**
 * Pending changes: approved requests waiting out their change window.
 * Status transitions: PENDING → EXECUTED | CANCELLED | FAILED (terminal).
 */

import type { ChangeRequest } from './ChangeRequestTypes';
import type { ApprovedVerdict } from './GuardrailTypes';

export type PendingChangeStatus = 'PENDING' | 'EXECUTED' | 'CANCELLED' | 'FAILED';

export interface PendingChangeRecord {
  change_id: string;
  campaign_id: string;
  change_request: ChangeRequest;
  verdict: ApprovedVerdict;
  execute_after: string;
  status: PendingChangeStatus;
  /** Incremented on every transition; used for optimistic locking. */
  version: number;
  created_at: string;
  updated_at: string;
  executed_at?: string;
  execution_ref?: string;
  cancelled_at?: string;
  cancel_reason?: string;
  failed_at?: string;
  failure_reason?: string;
}

export interface IPendingChangeStore {
  add(request: ChangeRequest, verdict: ApprovedVerdict): Promise<PendingChangeRecord>;
  get(changeId: string): Promise<PendingChangeRecord | null>;
  listPending(campaignId?: string): Promise<PendingChangeRecord[]>;
  /** PENDING changes whose execute_after is at or before `now`, oldest first. */
  listDue(now: Date): Promise<PendingChangeRecord[]>;
  /** Returns false when the record is no longer PENDING (or the version moved). */
  markExecuted(changeId: string, executionRef: string, expectedVersion?: number): Promise<boolean>;
  markFailed(changeId: string, reason: string, expectedVersion?: number): Promise<boolean>;
  cancel(changeId: string, reason?: string, expectedVersion?: number): Promise<boolean>;
}
