import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { EventEnvelope, createEventSource } from '../../types/EventTypes';
import { Logger } from '../core/Logger';

/**
 * EventPublisher - Publish events to EventBridge
 */
export class EventPublisher {
  constructor(
    private eventBridgeClient: EventBridgeClient,
    private eventBusName: string,
    private logger: Logger
  ) {}

  /**
   * Publish single event. Throws when EventBridge rejects the entry.
   * @returns the EventBridge event id
   */
  async publish<P>(event: EventEnvelope<P>): Promise<string> {
    const namespacedSource = createEventSource(event.source);
    try {
      const result = await this.eventBridgeClient.send(
        new PutEventsCommand({
          Entries: [
            {
              Source: namespacedSource,
              DetailType: event.eventType,
              Detail: JSON.stringify(event),
              EventBusName: this.eventBusName,
            },
          ],
        })
      );

      if (result.FailedEntryCount && result.FailedEntryCount > 0) {
        const error = result.Entries?.[0]?.ErrorMessage || 'Unknown error';
        throw new Error(`Failed to publish event: ${error}`);
      }

      const eventId = result.Entries?.[0]?.EventId ?? '';
      this.logger.debug('Event published', {
        eventType: event.eventType,
        campaignId: event.campaignId,
        source: namespacedSource,
        eventId,
      });
      return eventId;
    } catch (error) {
      this.logger.error('Failed to publish event', {
        eventType: event.eventType,
        campaignId: event.campaignId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
