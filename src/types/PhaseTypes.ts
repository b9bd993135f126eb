/**
 * Campaign phase state machine: PHASE_1 (learning) → PHASE_2 (tCPA) → PHASE_3 (scale).
 */

export type CampaignPhase = 'PHASE_1' | 'PHASE_2' | 'PHASE_3';

export const NEXT_PHASE: Record<CampaignPhase, CampaignPhase | null> = {
  PHASE_1: 'PHASE_2',
  PHASE_2: 'PHASE_3',
  PHASE_3: null,
};

export interface PhaseMetrics {
  primary_conversions: string[];
  secondary_conversions: string[];
  primary_conversions_count: number;
  /** Reported for context only; never used by a gate. */
  secondary_conversions_count: number;
  campaign_age_days: number;
  cpl_7d: number;
  cpl_30d: number;
  days_since_last_change: number;
  days_under_tcpa: number;
  current_cpl: number;
  /** Share of leads tagged "serious" in the CRM, 0-100. */
  lead_quality_percent: number;
  /** Spend / budget ratio; below the threshold means budget-constrained. */
  current_pacing: number;
}

export interface Phase1Requirements {
  min_conversions: number;
  min_days: number;
  cpl_stability_threshold_percent: number;
  no_changes_days: number;
  time_based_min_days: number;
  time_based_min_conversions: number;
  time_based_max_cpl_increase_percent: number;
}

export interface Phase2Requirements {
  min_tcpa_days: number;
  cpl_min: number;
  cpl_max: number;
  lead_quality_threshold_percent: number;
  pacing_threshold: number;
}

export interface PhaseTimeline {
  expected_days: number;
  max_days: number;
}

export interface PhaseConfig {
  phase_1: Phase1Requirements;
  phase_2: Phase2Requirements;
  timelines: Record<CampaignPhase, PhaseTimeline>;
  grace_period_days: number;
}

export type ProgressionPath = 'STANDARD' | 'TIME_BASED';

export interface Phase1EligibilityDetails {
  outcome: 'PHASE_1';
  blocking_factors: string[];
  primary_conversions: number;
  secondary_conversions: number;
  campaign_age_days: number;
  cpl_stability_percent: number;
  days_since_last_change: number;
  progression_path: ProgressionPath | null;
  requirements_met: {
    standard_path: boolean;
    time_based_path: boolean;
    conversions: boolean;
    campaign_age: boolean;
    cpl_stability: boolean;
    no_recent_changes: boolean;
    time_based_age: boolean;
    time_based_conversions: boolean;
    performance_stable: boolean;
  };
}

export interface Phase2EligibilityDetails {
  outcome: 'PHASE_2';
  blocking_factors: string[];
  days_under_tcpa: number;
  current_cpl: number;
  lead_quality_percent: number;
  current_pacing: number;
  requirements_met: {
    tcpa_duration: boolean;
    cpl_range: boolean;
    lead_quality: boolean;
    pacing: boolean;
  };
}

export interface Phase3EligibilityDetails {
  outcome: 'PHASE_3';
  blocking_factors: string[];
  optimization_opportunities: string[];
  current_cpl: number;
  current_pacing: number;
  lead_quality_percent: number;
}

export interface ConversionHygieneFailureDetails {
  outcome: 'CONVERSION_HYGIENE_FAILED';
  blocking_factors: string[];
  conversion_hygiene_reason: string;
}

export interface EligibilityErrorDetails {
  outcome: 'ERROR';
  blocking_factors: string[];
  error: string;
}

export type PhaseEligibilityDetails =
  | Phase1EligibilityDetails
  | Phase2EligibilityDetails
  | Phase3EligibilityDetails
  | ConversionHygieneFailureDetails
  | EligibilityErrorDetails;

export interface PhaseEligibilityResult {
  eligible_for_next: boolean;
  recommended_action: string;
  details: PhaseEligibilityDetails;
}

export type PhaseProgressStatus = 'ON_TRACK' | 'GRACE' | 'LAGGING' | 'CRITICAL';

export interface PhaseProgressInput {
  start_date: Date;
  today: Date;
  phase: CampaignPhase;
  eligibility: PhaseEligibilityResult;
  expected_days?: number;
  max_days?: number;
}

export interface PhaseProgressResult {
  lagging: boolean;
  lag_alert: boolean;
  days_in_phase: number;
  message: string;
  status: PhaseProgressStatus;
  expected_days: number;
  max_days: number;
}

/**
 * What a phase snapshot provider returns for one campaign.
 */
export interface PhaseSnapshot {
  campaign_id: string;
  phase: CampaignPhase;
  /** ISO date (YYYY-MM-DD) the current phase began. */
  phase_started_at: string;
  metrics: PhaseMetrics;
}
