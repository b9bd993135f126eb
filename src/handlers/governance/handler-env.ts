/**
 * Shared wiring for the governance Lambda handlers. Loads .env for local
 * runs; in Lambda the variables come from the function configuration.
 */

import * as dotenv from 'dotenv';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { EventBridgeClient } from '@aws-sdk/client-eventbridge';
import { getAWSClientConfig } from '../../utils/aws-client-config';

dotenv.config();

/**
 * Helper to validate required environment variables with descriptive errors
 */
export function requireEnv(name: string, handlerName: string): string {
  const value = process.env[name];
  if (!value) {
    const error = new Error(
      `[${handlerName}] Missing required environment variable: ${name}. ` +
      `This variable must be set in the Lambda function configuration.`
    );
    error.name = 'ConfigurationError';
    throw error;
  }
  return value;
}

export function createDocumentClient(region: string): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient(getAWSClientConfig(region)), {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export function createEventBridgeClient(region: string): EventBridgeClient {
  return new EventBridgeClient(getAWSClientConfig(region));
}

/**
 * Comma-separated list, blanks dropped.
 */
export function parseCampaignIds(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}
