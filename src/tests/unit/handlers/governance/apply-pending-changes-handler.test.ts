/**
 * Apply Pending Changes Handler Unit Tests
 * Invokes handler from handlers/governance/apply-pending-changes-handler.ts
 */

const mockRunDue = jest.fn();

jest.mock('../../../../utils/aws-client-config', () => ({
  getAWSClientConfig: jest.fn().mockReturnValue({ region: 'us-east-1' }),
}));

jest.mock('@aws-sdk/client-dynamodb', () => {
  const actual = jest.requireActual('@aws-sdk/client-dynamodb');
  return { ...actual, DynamoDBClient: jest.fn().mockImplementation(() => ({})) };
});

jest.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: {
    from: jest.fn().mockReturnValue({ send: jest.fn() }),
  },
}));

jest.mock('@aws-sdk/client-eventbridge', () => ({
  EventBridgeClient: jest.fn().mockImplementation(() => ({ send: jest.fn() })),
}));

jest.mock('../../../../services/changes/PendingChangeRunner', () => ({
  PendingChangeRunner: jest.fn().mockImplementation(() => ({
    runDue: mockRunDue,
  })),
}));

import { handler } from '../../../../handlers/governance/apply-pending-changes-handler';
import { PendingChangeRunner } from '../../../../services/changes/PendingChangeRunner';

describe('ApplyPendingChangesHandler (handler-invoking)', () => {
  beforeEach(() => {
    mockRunDue.mockReset();
  });

  it('builds the runner with re-validation on by default', () => {
    const options = jest.mocked(PendingChangeRunner).mock.calls[0][6];
    expect(options).toEqual({ revalidate: true });
  });

  it('returns the run report', async () => {
    const report = { due: 1, executed: 1, failed: 0, cancelled: 0, skipped: 0, outcomes: [] };
    mockRunDue.mockResolvedValue(report);

    await expect(handler()).resolves.toBe(report);
    expect(mockRunDue).toHaveBeenCalledTimes(1);
  });

  it('rethrows when the run fails', async () => {
    mockRunDue.mockRejectedValue(new Error('DynamoDB error'));

    await expect(handler()).rejects.toThrow('DynamoDB error');
  });
});
