/**
 * Unit tests for EventBridgeNotificationSink
 */

import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { EventBridgeNotificationSink } from '../../../services/notifications/EventBridgeNotificationSink';
import { EventPublisher } from '../../../services/events/EventPublisher';
import { Logger } from '../../../services/core/Logger';
import { mockEventBridgeClient, resetAllMocks, createEventBridgeSuccessResponse } from '../../__mocks__/aws-sdk-clients';
import { NOW } from '../../fixtures/campaign-fixtures';

jest.mock('@aws-sdk/client-eventbridge', () => ({
  EventBridgeClient: jest.fn(() => mockEventBridgeClient),
  PutEventsCommand: jest.fn(),
}));

describe('EventBridgeNotificationSink', () => {
  const logger = new Logger('EventBridgeNotificationSink.test');
  const sink = new EventBridgeNotificationSink(
    new EventPublisher(new EventBridgeClient({ region: 'us-east-1' }), 'test-governance-bus', logger),
    logger,
    () => NOW
  );

  beforeEach(() => {
    resetAllMocks();
    jest.mocked(PutEventsCommand).mockClear();
  });

  it('publishes the notification kind as the detail type', async () => {
    mockEventBridgeClient.send.mockResolvedValue(createEventBridgeSuccessResponse());
    const payload = { campaign_id: 'campaign-1', change_id: 'change-1', reason: 'Ads API rejected mutation' };

    await expect(sink.notify('CHANGE_FAILED', payload)).resolves.toBe(true);

    const entry = jest.mocked(PutEventsCommand).mock.calls[0][0].Entries?.[0];
    expect(entry?.Source).toBe('pmax-governance.notifications');
    expect(entry?.DetailType).toBe('CHANGE_FAILED');
    expect(JSON.parse(entry?.Detail ?? '{}')).toEqual({
      source: 'notifications',
      eventType: 'CHANGE_FAILED',
      campaignId: 'campaign-1',
      ts: '2026-03-15T12:00:00.000Z',
      payload,
    });
  });

  it('resolves false instead of throwing when publishing fails', async () => {
    mockEventBridgeClient.send.mockRejectedValue(new Error('EventBridge error'));

    await expect(
      sink.notify('STOP_LOSS', { campaign_id: 'campaign-1', alerts: ['STOP-LOSS: No conversions in 14 days - freeze all changes'] })
    ).resolves.toBe(false);
  });
});
