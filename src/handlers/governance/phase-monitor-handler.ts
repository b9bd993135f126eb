/**
 * Phase Monitor Handler
 *
 * Scheduled daily. Checks phase eligibility and timeline for each monitored
 * campaign and publishes advance/lag notifications.
 */

import { EventBridgeEvent } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { PhaseMonitorRunResult, PhaseMonitorService } from '../../services/phase/PhaseMonitorService';
import { PhaseStateMachine } from '../../services/phase/PhaseStateMachine';
import { EventPublisher } from '../../services/events/EventPublisher';
import { EventBridgeNotificationSink } from '../../services/notifications/EventBridgeNotificationSink';
import { DynamoCampaignDataProvider } from '../../adapters/campaign/DynamoCampaignDataProvider';
import { formatZodIssues } from '../../types/CampaignSchemas';
import { PhaseMonitorDetailSchema, validationError } from './handler-schemas';
import { createDocumentClient, createEventBridgeClient, parseCampaignIds, requireEnv } from './handler-env';

const HANDLER_NAME = 'PhaseMonitorHandler';
const logger = new Logger(HANDLER_NAME);

const region = requireEnv('AWS_REGION', HANDLER_NAME);
const snapshotsTableName = requireEnv('CAMPAIGN_SNAPSHOTS_TABLE_NAME', HANDLER_NAME);
const eventBusName = requireEnv('GOVERNANCE_EVENT_BUS_NAME', HANDLER_NAME);
const monitoredCampaignIds = parseCampaignIds(process.env.MONITORED_CAMPAIGN_IDS);

const publisher = new EventPublisher(createEventBridgeClient(region), eventBusName, logger);
const monitor = new PhaseMonitorService(
  new DynamoCampaignDataProvider(createDocumentClient(region), snapshotsTableName, logger),
  new PhaseStateMachine(),
  new EventBridgeNotificationSink(publisher, logger),
  logger
);

export const handler = async (
  event: EventBridgeEvent<string, unknown>
): Promise<PhaseMonitorRunResult> => {
  const parsed = PhaseMonitorDetailSchema.safeParse(event.detail ?? {});
  if (!parsed.success) {
    throw validationError(HANDLER_NAME, formatZodIssues(parsed.error));
  }
  const campaignIds = parsed.data.campaign_ids ?? monitoredCampaignIds;
  logger.info('Phase monitor handler invoked', { campaigns: campaignIds.length });

  const result = await monitor.monitorCampaigns(campaignIds);
  if (result.failures.length > 0) {
    logger.warn('Phase monitor finished with failures', {
      failures: result.failures.map((f) => f.campaign_id),
    });
  }
  return result;
};
