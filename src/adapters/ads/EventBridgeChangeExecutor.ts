import { ChangeExecutionResult, IChangeExecutor } from '../../types/CollaboratorTypes';
import { PendingChangeRecord } from '../../types/PendingChangeTypes';
import { CHANGE_EXECUTION_REQUESTED } from '../../types/EventTypes';
import { EventPublisher } from '../../services/events/EventPublisher';
import { Logger } from '../../services/core/Logger';

/**
 * Hands a due change to the ads-platform adapter by emitting
 * ChangeExecutionRequested. The EventBridge event id is the execution ref.
 */
export class EventBridgeChangeExecutor implements IChangeExecutor {
  constructor(
    private publisher: EventPublisher,
    private logger: Logger,
    private clock: () => Date = () => new Date()
  ) {}

  async execute(record: PendingChangeRecord): Promise<ChangeExecutionResult> {
    try {
      const eventId = await this.publisher.publish({
        source: 'executor',
        eventType: CHANGE_EXECUTION_REQUESTED,
        campaignId: record.campaign_id,
        ts: this.clock().toISOString(),
        payload: {
          change_id: record.change_id,
          version: record.version,
          change_request: record.change_request,
        },
      });
      return { success: true, execution_ref: eventId || record.change_id };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Change execution request not published', {
        changeId: record.change_id,
        campaignId: record.campaign_id,
        error: message,
      });
      return { success: false, error: message };
    }
  }
}
