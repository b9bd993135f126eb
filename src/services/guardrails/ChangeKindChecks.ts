/**
 * Kind-specific guardrail checks. Each runs after the shared pre-checks
 * (stop-loss, one lever per week, hard invariants) have passed.
 */

import {
  AssetGroupModificationRequest,
  BudgetAdjustmentRequest,
  CampaignEnableRequest,
  CampaignPauseRequest,
  GeoTargetingModificationRequest,
  TargetCpaAdjustmentRequest,
} from '../../types/ChangeRequestTypes';
import { CampaignState } from '../../types/CampaignStateTypes';
import { GuardrailPolicy, KindCheckResult, SuggestedChange } from '../../types/GuardrailTypes';
import { daysSince, roundToCents } from '../../utils/date-utils';
import { findEnabledGroupShortfalls } from './validators/AssetRequirementsValidator';
import { checkSafetyStopLoss } from './SafetyStopLoss';

/** Dollar tolerance for bound and step comparisons. */
export const DOLLAR_EPSILON = 0.01;

interface StepLimits {
  min: number;
  max: number;
  max_adjustment_percent: number;
}

type StepCheck =
  | { outcome: 'WITHIN'; step_percent: number | null }
  | { outcome: 'EXCEEDED'; step_percent: number; suggested: number };

/**
 * Percentage step from `current` to `proposed`. A zero or missing baseline
 * skips the cap. The suggestion is the cap in the requested direction,
 * clamped to the absolute bounds.
 */
function checkStep(current: number | null, proposed: number, limits: StepLimits): StepCheck {
  if (current === null || current <= 0) {
    return { outcome: 'WITHIN', step_percent: null };
  }
  const delta = proposed - current;
  const stepPercent = (Math.abs(delta) / current) * 100;
  const allowed = (current * limits.max_adjustment_percent) / 100;
  if (Math.abs(delta) <= allowed + DOLLAR_EPSILON) {
    return { outcome: 'WITHIN', step_percent: stepPercent };
  }
  const direction = delta > 0 ? 1 : -1;
  const boundary = current * (1 + (direction * limits.max_adjustment_percent) / 100);
  const suggested = roundToCents(Math.min(limits.max, Math.max(limits.min, boundary)));
  return { outcome: 'EXCEEDED', step_percent: stepPercent, suggested };
}

function fail(reason: string): KindCheckResult {
  return { outcome: 'FAIL', reasons: [reason] };
}

function failWithSuggestion(reason: string, modifiedChange: SuggestedChange): KindCheckResult {
  return { outcome: 'FAIL_WITH_SUGGESTION', reasons: [reason], modified_change: modifiedChange };
}

export function checkBudgetChange(
  request: BudgetAdjustmentRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): KindCheckResult {
  const limits = policy.budget_limits;
  const proposed = request.new_daily_budget;

  if (proposed < limits.min_daily - DOLLAR_EPSILON) {
    return fail(`Budget $${proposed.toFixed(2)} below minimum $${limits.min_daily.toFixed(2)}`);
  }
  if (proposed > limits.max_daily + DOLLAR_EPSILON) {
    return fail(`Budget $${proposed.toFixed(2)} above maximum $${limits.max_daily.toFixed(2)}`);
  }

  const step = checkStep(state.daily_budget, proposed, {
    min: limits.min_daily,
    max: limits.max_daily,
    max_adjustment_percent: limits.max_adjustment_percent,
  });
  if (step.outcome === 'EXCEEDED') {
    return failWithSuggestion(
      `Budget adjustment ${step.step_percent.toFixed(1)}% exceeds maximum ${limits.max_adjustment_percent}%`,
      { kind: 'BUDGET_ADJUSTMENT', new_daily_budget: step.suggested }
    );
  }

  const days = daysSince(state.last_budget_change_at, now);
  if (days !== null && days < limits.max_frequency_days) {
    return fail(`Budget changed ${days} days ago (minimum ${limits.max_frequency_days} days)`);
  }

  const reasons = ['Budget adjustment meets all guardrail requirements'];
  if (step.step_percent !== null && step.step_percent < limits.min_adjustment_percent) {
    reasons.push(
      `Advisory: budget step ${step.step_percent.toFixed(1)}% is below the recommended ${limits.min_adjustment_percent}% minimum`
    );
  }
  return { outcome: 'PASS', reasons, alerts: [] };
}

export function checkTargetCpaChange(
  request: TargetCpaAdjustmentRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): KindCheckResult {
  const limits = policy.target_cpa_limits;
  const proposed = request.new_target_cpa;

  if (state.total_conversions < limits.min_conversions) {
    return fail(`Only ${state.total_conversions} conversions (minimum ${limits.min_conversions})`);
  }
  if (proposed < limits.min_value - DOLLAR_EPSILON) {
    return fail(`Target CPA $${proposed.toFixed(2)} below minimum $${limits.min_value.toFixed(2)}`);
  }
  if (proposed > limits.max_value + DOLLAR_EPSILON) {
    return fail(`Target CPA $${proposed.toFixed(2)} above maximum $${limits.max_value.toFixed(2)}`);
  }

  const step = checkStep(state.target_cpa, proposed, {
    min: limits.min_value,
    max: limits.max_value,
    max_adjustment_percent: limits.max_adjustment_percent,
  });
  if (step.outcome === 'EXCEEDED') {
    return failWithSuggestion(
      `Target CPA adjustment ${step.step_percent.toFixed(1)}% exceeds maximum ${limits.max_adjustment_percent}%`,
      { kind: 'TARGET_CPA_ADJUSTMENT', new_target_cpa: step.suggested }
    );
  }

  const days = daysSince(state.last_target_cpa_change_at, now);
  if (days !== null && days < limits.max_frequency_days) {
    return fail(`Target CPA changed ${days} days ago (minimum ${limits.max_frequency_days} days)`);
  }

  const reasons = ['Target CPA adjustment meets all guardrail requirements'];
  if (step.step_percent !== null && step.step_percent < limits.min_adjustment_percent) {
    reasons.push(
      `Advisory: target CPA step ${step.step_percent.toFixed(1)}% is below the recommended ${limits.min_adjustment_percent}% minimum`
    );
  }
  return { outcome: 'PASS', reasons, alerts: [] };
}

export function checkAssetGroupChange(
  request: AssetGroupModificationRequest,
  state: CampaignState,
  policy: GuardrailPolicy
): KindCheckResult {
  if (request.action === 'PAUSE_ALL') {
    return fail('Cannot pause all asset groups');
  }

  const shortfalls = findEnabledGroupShortfalls(state.asset_groups, policy.asset_requirements);
  if (shortfalls.length > 0) {
    const missing = shortfalls.flatMap(([name, assets]) => assets.map((asset) => `${name}: ${asset}`));
    return fail(`Missing required assets: ${missing.join(', ')}`);
  }

  return { outcome: 'PASS', reasons: ['Asset group modification meets all guardrail requirements'], alerts: [] };
}

/**
 * A change recorded inside period_days counts toward the period even when the
 * snapshot's counter lags behind it.
 */
export function checkGeoTargetingChange(
  request: GeoTargetingModificationRequest,
  state: CampaignState,
  policy: GuardrailPolicy,
  now: Date
): KindCheckResult {
  const limits = policy.geo_targeting_limits;

  const days = daysSince(state.last_geo_change_at, now);
  const changedInPeriod = days !== null && days < limits.period_days;
  const changesInPeriod = Math.max(state.geo_changes_in_period, changedInPeriod ? 1 : 0);
  if (changesInPeriod >= limits.max_changes_per_period) {
    if (changedInPeriod && limits.max_changes_per_period === 1) {
      return fail(`Geo targeting changed ${days} days ago (minimum ${limits.period_days} days)`);
    }
    return fail(
      `Geo targeting changed ${changesInPeriod} times in the last ${limits.period_days} days ` +
        `(maximum ${limits.max_changes_per_period})`
    );
  }

  if (request.action === 'ADD_LOCATION' && limits.presence_only_required && request.location_type !== 'presence') {
    return fail(`Location type '${request.location_type ?? ''}' not allowed (presence-only required)`);
  }

  return { outcome: 'PASS', reasons: ['Geo targeting modification meets all guardrail requirements'], alerts: [] };
}

export function checkCampaignStatusChange(
  request: CampaignPauseRequest | CampaignEnableRequest,
  state: CampaignState,
  policy: GuardrailPolicy
): KindCheckResult {
  const alerts = request.kind === 'CAMPAIGN_PAUSE'
    ? checkSafetyStopLoss(state, policy.safety_limits).alerts
    : [];
  return { outcome: 'PASS', reasons: ['Campaign status change meets all guardrail requirements'], alerts };
}
