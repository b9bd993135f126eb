import { INotificationSink, NotificationKind, NotificationPayloadMap } from '../../types/NotificationTypes';
import { EventPublisher } from '../events/EventPublisher';
import { Logger } from '../core/Logger';

/**
 * Publishes notifications to the governance event bus; email and Slack
 * delivery subscribe downstream. Best-effort: a publish failure is logged
 * and reported as false.
 */
export class EventBridgeNotificationSink implements INotificationSink {
  constructor(
    private publisher: EventPublisher,
    private logger: Logger,
    private clock: () => Date = () => new Date()
  ) {}

  async notify<K extends NotificationKind>(kind: K, payload: NotificationPayloadMap[K]): Promise<boolean> {
    try {
      await this.publisher.publish({
        source: 'notifications',
        eventType: kind,
        campaignId: payload.campaign_id,
        ts: this.clock().toISOString(),
        payload,
      });
      return true;
    } catch (error) {
      this.logger.warn('Notification not delivered', {
        kind,
        campaignId: payload.campaign_id,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
