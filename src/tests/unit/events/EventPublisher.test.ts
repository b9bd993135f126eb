import { EventPublisher } from '../../../services/events/EventPublisher';
import { Logger } from '../../../services/core/Logger';
import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { createEventSource, EventEnvelope } from '../../../types/EventTypes';
import { mockEventBridgeClient, resetAllMocks, createEventBridgeSuccessResponse } from '../../__mocks__/aws-sdk-clients';

jest.mock('@aws-sdk/client-eventbridge', () => ({
  EventBridgeClient: jest.fn(() => mockEventBridgeClient),
  PutEventsCommand: jest.fn(),
}));

describe('EventPublisher', () => {
  let eventPublisher: EventPublisher;

  const event: EventEnvelope<{ alerts: string[] }> = {
    source: 'notifications',
    eventType: 'STOP_LOSS',
    campaignId: 'campaign-1',
    ts: '2026-03-15T12:00:00.000Z',
    payload: { alerts: ['STOP-LOSS: No conversions in 14 days - freeze all changes'] },
  };

  beforeEach(() => {
    resetAllMocks();
    jest.mocked(PutEventsCommand).mockClear();
    eventPublisher = new EventPublisher(
      new EventBridgeClient({ region: 'us-east-1' }),
      'test-governance-bus',
      new Logger('EventPublisherTest')
    );
  });

  describe('createEventSource', () => {
    it('should namespace the source', () => {
      expect(createEventSource('executor')).toBe('pmax-governance.executor');
    });
  });

  describe('publish', () => {
    it('should publish the envelope as the event detail', async () => {
      mockEventBridgeClient.send.mockResolvedValue(createEventBridgeSuccessResponse('evt-42'));

      const eventId = await eventPublisher.publish(event);

      expect(eventId).toBe('evt-42');
      expect(mockEventBridgeClient.send).toHaveBeenCalledTimes(1);
      expect(jest.mocked(PutEventsCommand).mock.calls[0][0]).toEqual({
        Entries: [
          {
            Source: 'pmax-governance.notifications',
            DetailType: 'STOP_LOSS',
            Detail: JSON.stringify(event),
            EventBusName: 'test-governance-bus',
          },
        ],
      });
    });

    it('should return an empty id when EventBridge returns none', async () => {
      mockEventBridgeClient.send.mockResolvedValue({ FailedEntryCount: 0, Entries: [{}] });

      await expect(eventPublisher.publish(event)).resolves.toBe('');
    });

    it('should throw error on publish failure', async () => {
      mockEventBridgeClient.send.mockResolvedValue({
        FailedEntryCount: 1,
        Entries: [{ ErrorMessage: 'Publish failed' }],
      });

      await expect(eventPublisher.publish(event)).rejects.toThrow('Failed to publish event: Publish failed');
    });

    it('should handle EventBridge errors', async () => {
      mockEventBridgeClient.send.mockRejectedValue(new Error('EventBridge error'));

      await expect(eventPublisher.publish(event)).rejects.toThrow('EventBridge error');
    });
  });
});
