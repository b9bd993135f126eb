/**
 * Guardrail policy limits and verdicts.
 *
 * The verdict is a tagged union so that a suggestion can only travel with a
 * rejection and an execution time only with an approval.
 */

export interface BudgetLimits {
  min_daily: number;
  max_daily: number;
  max_adjustment_percent: number;
  /** Advisory only: smaller steps are approved with a note. */
  min_adjustment_percent: number;
  max_frequency_days: number;
}

export interface TargetCpaLimits {
  min_value: number;
  max_value: number;
  max_adjustment_percent: number;
  min_adjustment_percent: number;
  max_frequency_days: number;
  min_conversions: number;
}

export interface AssetRequirements {
  headlines: number;
  long_headlines: number;
  descriptions: number;
  business_name_required: boolean;
  logos_1_1: number;
  logos_4_1: number;
  images_1_91_1: number;
  images_1_1: number;
  vertical_videos: number;
  auto_generated_video_allowed: boolean;
}

export interface GeoTargetingLimits {
  presence_only_required: boolean;
  max_changes_per_period: number;
  period_days: number;
}

export interface SafetyLimits {
  spend_multiplier_threshold: number;
  conversion_dry_spell_days: number;
}

export interface ChangeControls {
  change_window_hours: number;
  one_lever_per_week_days: number;
}

export interface GuardrailPolicy {
  budget_limits: BudgetLimits;
  target_cpa_limits: TargetCpaLimits;
  asset_requirements: AssetRequirements;
  geo_targeting_limits: GeoTargetingLimits;
  safety_limits: SafetyLimits;
  change_controls: ChangeControls;
  required_url_exclusions: string[];
  /** Locations that must be excluded while presence-only targeting is required. */
  required_geo_exclusions: string[];
}

export type GuardrailDecision = 'APPROVED' | 'REJECTED' | 'REJECTED_WITH_SUGGESTION';

export type SuggestedChange =
  | { kind: 'BUDGET_ADJUSTMENT'; new_daily_budget: number }
  | { kind: 'TARGET_CPA_ADJUSTMENT'; new_target_cpa: number };

export interface ApprovedVerdict {
  decision: 'APPROVED';
  reasons: string[];
  alerts: string[];
  execute_after: string;
}

export interface RejectedVerdict {
  decision: 'REJECTED';
  reasons: string[];
  alerts: string[];
}

export interface RejectedWithSuggestionVerdict {
  decision: 'REJECTED_WITH_SUGGESTION';
  reasons: string[];
  alerts: string[];
  modified_change: SuggestedChange;
}

export type GuardrailVerdict = ApprovedVerdict | RejectedVerdict | RejectedWithSuggestionVerdict;

export function isApproved(verdict: GuardrailVerdict): verdict is ApprovedVerdict {
  return verdict.decision === 'APPROVED';
}

/**
 * Outcome of a single kind-specific check, before the change window is applied.
 */
export type KindCheckResult =
  | { outcome: 'PASS'; reasons: string[]; alerts: string[] }
  | { outcome: 'FAIL'; reasons: string[] }
  | { outcome: 'FAIL_WITH_SUGGESTION'; reasons: string[]; modified_change: SuggestedChange };
