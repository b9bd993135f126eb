/**
 * Guardrail Engine
 *
 * Deterministic, pure evaluation of a proposed campaign change against the
 * current campaign state and the guardrail policy. Same input → same output.
 * No I/O: scheduling and notifying an approved change is the caller's job.
 *
 * Order (first disqualifying condition wins, alerts accumulate):
 *   1. safety stop-loss
 *   2. one lever per week
 *   3. hard invariants
 *   4. kind-specific checks
 *   5. change window on approval
 *
 * Never throws; an internal fault becomes a REJECTED verdict.
 */

import { ChangeRequest } from '../../types/ChangeRequestTypes';
import { CampaignState } from '../../types/CampaignStateTypes';
import {
  GuardrailPolicy,
  GuardrailVerdict,
  KindCheckResult,
} from '../../types/GuardrailTypes';
import { addHours, daysSince } from '../../utils/date-utils';
import { getGuardrailPolicy, getGuardrailSummary, GuardrailSummary } from '../../config/guardrailPolicyConfig';
import { checkSafetyStopLoss } from './SafetyStopLoss';
import { checkHardInvariants } from './validators/HardInvariantValidator';
import {
  checkAssetGroupChange,
  checkBudgetChange,
  checkCampaignStatusChange,
  checkGeoTargetingChange,
  checkTargetCpaChange,
} from './ChangeKindChecks';

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return String(value);
}

function checkKind(
  request: ChangeRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): KindCheckResult {
  switch (request.kind) {
    case 'BUDGET_ADJUSTMENT':
      return checkBudgetChange(request, state, policy, now);
    case 'TARGET_CPA_ADJUSTMENT':
      return checkTargetCpaChange(request, state, policy, now);
    case 'ASSET_GROUP_MODIFICATION':
      return checkAssetGroupChange(request, state, policy);
    case 'GEO_TARGETING_MODIFICATION':
      return checkGeoTargetingChange(request, state, policy, now);
    case 'CAMPAIGN_PAUSE':
    case 'CAMPAIGN_ENABLE':
      return checkCampaignStatusChange(request, state, policy);
    default: {
      const unknownRequest: never = request;
      return { outcome: 'FAIL', reasons: [`Unknown change type: ${describeKind(unknownRequest)}`] };
    }
  }
}

function evaluate(
  request: ChangeRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): GuardrailVerdict {
  const reasons: string[] = [];
  const alerts: string[] = [];

  const stopLoss = checkSafetyStopLoss(state, policy.safety_limits);
  alerts.push(...stopLoss.alerts);
  if (stopLoss.freeze_alert !== null) {
    reasons.push(`Safety stop-loss triggered: ${stopLoss.freeze_alert}`);
    return { decision: 'REJECTED', reasons, alerts };
  }
  reasons.push('No stop-loss freeze condition');

  const leverDays = policy.change_controls.one_lever_per_week_days;
  const sinceMajorChange = daysSince(state.last_major_change_at, now);
  if (sinceMajorChange !== null && sinceMajorChange < leverDays) {
    reasons.push(
      `One lever per week rule: major change ${sinceMajorChange} days ago (minimum ${leverDays} days)`
    );
    return { decision: 'REJECTED', reasons, alerts };
  }
  reasons.push(`No major lever changed in the last ${leverDays} days`);

  const invariants = checkHardInvariants(state, policy);
  if (!invariants.passed) {
    reasons.push(...invariants.reasons);
    return { decision: 'REJECTED', reasons, alerts };
  }
  reasons.push('All hard invariants hold');

  const result = checkKind(request, state, policy, now);
  reasons.push(...result.reasons);

  switch (result.outcome) {
    case 'FAIL':
      return { decision: 'REJECTED', reasons, alerts };
    case 'FAIL_WITH_SUGGESTION':
      return {
        decision: 'REJECTED_WITH_SUGGESTION',
        reasons,
        alerts,
        modified_change: result.modified_change,
      };
    case 'PASS':
      return {
        decision: 'APPROVED',
        reasons,
        alerts: dedupe([...alerts, ...result.alerts]),
        execute_after: addHours(now, policy.change_controls.change_window_hours).toISOString(),
      };
  }
}

/**
 * Evaluate a change request. Pure and side-effect free.
 */
export function enforceGuardrails(
  request: ChangeRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): GuardrailVerdict {
  try {
    return evaluate(request, state, policy, now);
  } catch (error) {
    return {
      decision: 'REJECTED',
      reasons: [`Error processing guardrails: ${error instanceof Error ? error.message : String(error)}`],
      alerts: [],
    };
  }
}

/**
 * Engine bound to one policy and a clock.
 */
export class GuardrailEngine {
  private readonly policy: GuardrailPolicy;
  private readonly clock: () => Date;

  constructor(policy?: GuardrailPolicy, clock: () => Date = () => new Date()) {
    this.policy = policy ?? getGuardrailPolicy();
    this.clock = clock;
  }

  enforce(request: ChangeRequest, state: CampaignState): GuardrailVerdict {
    return enforceGuardrails(request, state, this.policy, this.clock());
  }

  getPolicy(): GuardrailPolicy {
    return this.policy;
  }

  getSummary(): GuardrailSummary {
    return getGuardrailSummary(this.policy);
  }
}
