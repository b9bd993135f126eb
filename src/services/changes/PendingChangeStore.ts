/**
 * Pending Change Store
 *
 * DynamoDB table keyed by change_id, with GSI status-execute-after-index
 * (PK status, SK execute_after) for the runner's due-change query.
 *
 * Every transition out of PENDING is a conditional update on
 * `#status = PENDING` (and `#version` when the caller supplies one), so a
 * cancel racing an execution leaves exactly one terminal state. A failed
 * condition returns false rather than throwing.
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import { ChangeRequest } from '../../types/ChangeRequestTypes';
import { ApprovedVerdict } from '../../types/GuardrailTypes';
import {
  IPendingChangeStore,
  PendingChangeRecord,
  PendingChangeStatus,
} from '../../types/PendingChangeTypes';
import { PendingChangeRecordSchema, formatZodIssues } from '../../types/CampaignSchemas';
import { Logger } from '../core/Logger';

export const STATUS_EXECUTE_AFTER_INDEX = 'status-execute-after-index';

function isConditionalCheckFailed(err: unknown): boolean {
  return !!err && typeof err === 'object' && 'name' in err && err.name === 'ConditionalCheckFailedException';
}

interface Transition {
  next: PendingChangeStatus;
  /** Extra attributes written with the transition, besides status/version/updated_at. */
  attributes: Record<string, string>;
}

export class PendingChangeStore implements IPendingChangeStore {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tableName: string,
    private logger: Logger,
    private clock: () => Date = () => new Date()
  ) {}

  async add(request: ChangeRequest, verdict: ApprovedVerdict): Promise<PendingChangeRecord> {
    const now = this.clock().toISOString();
    const record: PendingChangeRecord = {
      change_id: uuidv4(),
      campaign_id: request.campaign_id,
      change_request: request,
      verdict,
      execute_after: verdict.execute_after,
      status: 'PENDING',
      version: 1,
      created_at: now,
      updated_at: now,
    };

    await this.dynamoClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: record,
        ConditionExpression: 'attribute_not_exists(change_id)',
      })
    );

    this.logger.info('Pending change stored', {
      changeId: record.change_id,
      campaignId: record.campaign_id,
      kind: request.kind,
      execute_after: record.execute_after,
    });
    return record;
  }

  async get(changeId: string): Promise<PendingChangeRecord | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { change_id: changeId },
      })
    );
    if (!result.Item) {
      return null;
    }
    const parsed = PendingChangeRecordSchema.safeParse(result.Item);
    if (!parsed.success) {
      throw new Error(`Malformed pending change ${changeId}: ${formatZodIssues(parsed.error).join('; ')}`);
    }
    return parsed.data;
  }

  async listPending(campaignId?: string): Promise<PendingChangeRecord[]> {
    const input: QueryCommandInput = {
      TableName: this.tableName,
      IndexName: STATUS_EXECUTE_AFTER_INDEX,
      KeyConditionExpression: '#status = :pending',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':pending': 'PENDING' },
    };
    if (campaignId) {
      input.FilterExpression = 'campaign_id = :campaign_id';
      input.ExpressionAttributeValues = { ...input.ExpressionAttributeValues, ':campaign_id': campaignId };
    }
    return this.queryAll(input);
  }

  async listDue(now: Date): Promise<PendingChangeRecord[]> {
    return this.queryAll({
      TableName: this.tableName,
      IndexName: STATUS_EXECUTE_AFTER_INDEX,
      KeyConditionExpression: '#status = :pending AND execute_after <= :now',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':pending': 'PENDING', ':now': now.toISOString() },
    });
  }

  async markExecuted(changeId: string, executionRef: string, expectedVersion?: number): Promise<boolean> {
    const now = this.clock().toISOString();
    return this.transition(changeId, {
      next: 'EXECUTED',
      attributes: { executed_at: now, execution_ref: executionRef },
    }, now, expectedVersion);
  }

  async markFailed(changeId: string, reason: string, expectedVersion?: number): Promise<boolean> {
    const now = this.clock().toISOString();
    return this.transition(changeId, {
      next: 'FAILED',
      attributes: { failed_at: now, failure_reason: reason },
    }, now, expectedVersion);
  }

  async cancel(changeId: string, reason = 'Cancelled by request', expectedVersion?: number): Promise<boolean> {
    const now = this.clock().toISOString();
    return this.transition(changeId, {
      next: 'CANCELLED',
      attributes: { cancelled_at: now, cancel_reason: reason },
    }, now, expectedVersion);
  }

  private async transition(
    changeId: string,
    transition: Transition,
    now: string,
    expectedVersion?: number
  ): Promise<boolean> {
    const setClauses = ['#status = :next', '#version = #version + :one', 'updated_at = :now'];
    const values: Record<string, string | number> = {
      ':next': transition.next,
      ':pending': 'PENDING',
      ':one': 1,
      ':now': now,
    };
    for (const [name, value] of Object.entries(transition.attributes)) {
      setClauses.push(`${name} = :${name}`);
      values[`:${name}`] = value;
    }

    let condition = '#status = :pending';
    if (expectedVersion !== undefined) {
      condition += ' AND #version = :expected';
      values[':expected'] = expectedVersion;
    }

    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { change_id: changeId },
          UpdateExpression: `SET ${setClauses.join(', ')}`,
          ConditionExpression: condition,
          ExpressionAttributeNames: { '#status': 'status', '#version': 'version' },
          ExpressionAttributeValues: values,
        })
      );
    } catch (err: unknown) {
      if (isConditionalCheckFailed(err)) {
        this.logger.warn('Pending change transition rejected; no longer PENDING or version moved', {
          changeId,
          next: transition.next,
          expectedVersion,
        });
        return false;
      }
      this.logger.error('Pending change transition failed', {
        changeId,
        next: transition.next,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    this.logger.info('Pending change transitioned', { changeId, status: transition.next });
    return true;
  }

  private async queryAll(input: QueryCommandInput): Promise<PendingChangeRecord[]> {
    const records: PendingChangeRecord[] = [];
    let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'];
    do {
      const result = await this.dynamoClient.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      );
      for (const item of result.Items ?? []) {
        const parsed = PendingChangeRecordSchema.safeParse(item);
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          this.logger.error('Skipping malformed pending change item', {
            change_id: item.change_id,
            issues: formatZodIssues(parsed.error),
          });
        }
      }
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);
    return records;
  }
}
