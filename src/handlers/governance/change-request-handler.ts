/**
 * Change Request Handler
 *
 * EventBridge entry point for proposed campaign changes.
 *   ChangeRequestSubmitted: detail is a ChangeRequest → guardrails → schedule on approval
 *   ChangeCancelRequested:  detail is { change_id, reason? } → cancel inside the change window
 */

import { EventBridgeEvent } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { ChangeGovernanceService, CancelChangeResult } from '../../services/changes/ChangeGovernanceService';
import { PendingChangeStore } from '../../services/changes/PendingChangeStore';
import { GuardrailEngine } from '../../services/guardrails/GuardrailEngine';
import { EventPublisher } from '../../services/events/EventPublisher';
import { EventBridgeNotificationSink } from '../../services/notifications/EventBridgeNotificationSink';
import { DynamoCampaignDataProvider } from '../../adapters/campaign/DynamoCampaignDataProvider';
import { getGuardrailPolicy } from '../../config/guardrailPolicyConfig';
import { formatZodIssues } from '../../types/CampaignSchemas';
import { GuardrailVerdict } from '../../types/GuardrailTypes';
import { CHANGE_CANCEL_REQUESTED, CHANGE_REQUEST_SUBMITTED } from '../../types/EventTypes';
import { CancelChangeDetailSchema, ChangeRequestSchema, validationError } from './handler-schemas';
import { createDocumentClient, createEventBridgeClient, requireEnv } from './handler-env';

const HANDLER_NAME = 'ChangeRequestHandler';
const logger = new Logger(HANDLER_NAME);

const region = requireEnv('AWS_REGION', HANDLER_NAME);
const snapshotsTableName = requireEnv('CAMPAIGN_SNAPSHOTS_TABLE_NAME', HANDLER_NAME);
const pendingChangesTableName = requireEnv('PENDING_CHANGES_TABLE_NAME', HANDLER_NAME);
const eventBusName = requireEnv('GOVERNANCE_EVENT_BUS_NAME', HANDLER_NAME);

const dynamoClient = createDocumentClient(region);
const publisher = new EventPublisher(createEventBridgeClient(region), eventBusName, logger);

// Policy loads at cold start; an unenforceable policy file fails the init.
const governanceService = new ChangeGovernanceService(
  new GuardrailEngine(getGuardrailPolicy()),
  new DynamoCampaignDataProvider(dynamoClient, snapshotsTableName, logger),
  new PendingChangeStore(dynamoClient, pendingChangesTableName, logger),
  new EventBridgeNotificationSink(publisher, logger),
  logger
);

export type ChangeRequestHandlerResult =
  | { action: 'SUBMITTED'; verdict: GuardrailVerdict; change_id?: string }
  | ({ action: 'CANCEL' } & CancelChangeResult);

export const handler = async (
  event: EventBridgeEvent<string, unknown>
): Promise<ChangeRequestHandlerResult> => {
  const detailType = event['detail-type'];
  logger.info('Change request handler invoked', { detailType, eventId: event.id });

  if (detailType === CHANGE_REQUEST_SUBMITTED) {
    const parsed = ChangeRequestSchema.safeParse(event.detail);
    if (!parsed.success) {
      throw validationError(HANDLER_NAME, formatZodIssues(parsed.error));
    }
    const result = await governanceService.submitChange(parsed.data);
    return {
      action: 'SUBMITTED',
      verdict: result.verdict,
      ...(result.pending_change ? { change_id: result.pending_change.change_id } : {}),
    };
  }

  if (detailType === CHANGE_CANCEL_REQUESTED) {
    const parsed = CancelChangeDetailSchema.safeParse(event.detail);
    if (!parsed.success) {
      throw validationError(HANDLER_NAME, formatZodIssues(parsed.error));
    }
    const result = await governanceService.cancelChange(parsed.data.change_id, parsed.data.reason);
    return { action: 'CANCEL', ...result };
  }

  throw validationError(HANDLER_NAME, [`Unsupported detail-type: ${detailType}`]);
};
