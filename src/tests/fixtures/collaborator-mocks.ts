/**
 * Typed jest doubles for the governance collaborators.
 */

import { ChangeRequest } from '../../types/ChangeRequestTypes';
import { CampaignState } from '../../types/CampaignStateTypes';
import { ChangeExecutionResult } from '../../types/CollaboratorTypes';
import { ApprovedVerdict } from '../../types/GuardrailTypes';
import { NotificationKind } from '../../types/NotificationTypes';
import { PendingChangeRecord } from '../../types/PendingChangeTypes';

export function createMockStore() {
  return {
    add: jest.fn<Promise<PendingChangeRecord>, [ChangeRequest, ApprovedVerdict]>(),
    get: jest.fn<Promise<PendingChangeRecord | null>, [string]>(),
    listPending: jest.fn<Promise<PendingChangeRecord[]>, [string?]>(),
    listDue: jest.fn<Promise<PendingChangeRecord[]>, [Date]>(),
    markExecuted: jest.fn<Promise<boolean>, [string, string, number?]>(),
    markFailed: jest.fn<Promise<boolean>, [string, string, number?]>(),
    cancel: jest.fn<Promise<boolean>, [string, string?, number?]>(),
  };
}

export function createMockDataProvider() {
  return { fetchState: jest.fn<Promise<CampaignState>, [string]>() };
}

export function createMockExecutor() {
  return { execute: jest.fn<Promise<ChangeExecutionResult>, [PendingChangeRecord]>() };
}

export function createMockSink() {
  return { notify: jest.fn<Promise<boolean>, [NotificationKind, unknown]>().mockResolvedValue(true) };
}
