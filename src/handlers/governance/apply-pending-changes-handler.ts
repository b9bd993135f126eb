/**
 * Apply Pending Changes Handler
 *
 * Scheduled (EventBridge rule, every 15 minutes). Executes pending changes
 * whose change window has elapsed, re-validating each against fresh state.
 */

import { Logger } from '../../services/core/Logger';
import { PendingChangeRunner, PendingChangeRunReport } from '../../services/changes/PendingChangeRunner';
import { PendingChangeStore } from '../../services/changes/PendingChangeStore';
import { GuardrailEngine } from '../../services/guardrails/GuardrailEngine';
import { EventPublisher } from '../../services/events/EventPublisher';
import { EventBridgeNotificationSink } from '../../services/notifications/EventBridgeNotificationSink';
import { DynamoCampaignDataProvider } from '../../adapters/campaign/DynamoCampaignDataProvider';
import { EventBridgeChangeExecutor } from '../../adapters/ads/EventBridgeChangeExecutor';
import { getGuardrailPolicy } from '../../config/guardrailPolicyConfig';
import { createDocumentClient, createEventBridgeClient, requireEnv } from './handler-env';

const HANDLER_NAME = 'ApplyPendingChangesHandler';
const logger = new Logger(HANDLER_NAME);

const region = requireEnv('AWS_REGION', HANDLER_NAME);
const snapshotsTableName = requireEnv('CAMPAIGN_SNAPSHOTS_TABLE_NAME', HANDLER_NAME);
const pendingChangesTableName = requireEnv('PENDING_CHANGES_TABLE_NAME', HANDLER_NAME);
const eventBusName = requireEnv('GOVERNANCE_EVENT_BUS_NAME', HANDLER_NAME);

const dynamoClient = createDocumentClient(region);
const publisher = new EventPublisher(createEventBridgeClient(region), eventBusName, logger);

const runner = new PendingChangeRunner(
  new PendingChangeStore(dynamoClient, pendingChangesTableName, logger),
  new EventBridgeChangeExecutor(publisher, logger),
  new GuardrailEngine(getGuardrailPolicy()),
  new DynamoCampaignDataProvider(dynamoClient, snapshotsTableName, logger),
  new EventBridgeNotificationSink(publisher, logger),
  logger,
  { revalidate: process.env.REVALIDATE_BEFORE_EXECUTION !== 'false' }
);

export const handler = async (): Promise<PendingChangeRunReport> => {
  logger.info('Apply pending changes handler invoked');
  try {
    return await runner.runDue();
  } catch (error) {
    logger.error('Apply pending changes failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
};
