/**
 * Typed errors raised outside the pure core (config loading, snapshot reads,
 * pending-change lookups). The engine itself never throws.
 */

export type GuardrailErrorCode =
  | 'POLICY_CONFIG_INVALID'
  | 'CAMPAIGN_SNAPSHOT_NOT_FOUND'
  | 'CAMPAIGN_SNAPSHOT_INVALID'
  | 'PENDING_CHANGE_NOT_FOUND';

export class GuardrailError extends Error {
  constructor(
    message: string,
    public readonly error_code: GuardrailErrorCode
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Policy file parsed but holds values the engine cannot run with
 * (negative limits, min above max). Fatal at startup.
 */
export class PolicyConfigError extends GuardrailError {
  constructor(public readonly violations: string[]) {
    super(`Invalid guardrail policy: ${violations.join('; ')}`, 'POLICY_CONFIG_INVALID');
  }
}

export class CampaignSnapshotNotFoundError extends GuardrailError {
  constructor(campaignId: string, snapshotType: string) {
    super(`No ${snapshotType} snapshot for campaign: ${campaignId}`, 'CAMPAIGN_SNAPSHOT_NOT_FOUND');
  }
}

export class InvalidCampaignSnapshotError extends GuardrailError {
  constructor(campaignId: string, snapshotType: string, issues: string[]) {
    super(
      `Invalid ${snapshotType} snapshot for campaign ${campaignId}: ${issues.join('; ')}`,
      'CAMPAIGN_SNAPSHOT_INVALID'
    );
  }
}

export class PendingChangeNotFoundError extends GuardrailError {
  constructor(changeId: string) {
    super(`Pending change not found: ${changeId}`, 'PENDING_CHANGE_NOT_FOUND');
  }
}
