/**
 * Campaign Phase State Machine
 *
 * PHASE_1 (learning) → PHASE_2 (tCPA) → PHASE_3 (scale, terminal).
 * Eligibility and progress checks are pure; notifying on the result is the
 * caller's job (see PhaseMonitorService).
 */

import {
  CampaignPhase,
  Phase1EligibilityDetails,
  Phase2EligibilityDetails,
  PhaseConfig,
  PhaseEligibilityResult,
  PhaseMetrics,
  PhaseProgressInput,
  PhaseProgressResult,
  PhaseProgressStatus,
  ProgressionPath,
} from '../../types/PhaseTypes';
import { getPhaseConfig } from '../../config/phaseConfig';
import { validateConversionMapping } from '../guardrails/validators/HardInvariantValidator';
import { utcDaysBetween } from '../../utils/date-utils';

/**
 * |7d − 30d| / 30d as a percentage; 0 when there is no 30-day baseline.
 */
export function calculateCplStability(metrics: PhaseMetrics): number {
  if (metrics.cpl_30d === 0) {
    return 0;
  }
  return (Math.abs(metrics.cpl_7d - metrics.cpl_30d) / metrics.cpl_30d) * 100;
}

/**
 * Stable unless CPL rose more than the allowed percentage over the 30-day baseline.
 * Decreases always count as stable.
 */
export function isPerformanceStable(metrics: PhaseMetrics, maxIncreasePercent: number): boolean {
  if (metrics.cpl_30d === 0) {
    return true;
  }
  return ((metrics.cpl_7d - metrics.cpl_30d) / metrics.cpl_30d) * 100 <= maxIncreasePercent;
}

function checkPhase1(metrics: PhaseMetrics, config: PhaseConfig): PhaseEligibilityResult {
  const req = config.phase_1;
  const conversions = metrics.primary_conversions_count;
  const age = metrics.campaign_age_days;
  const stability = calculateCplStability(metrics);
  const sinceChange = metrics.days_since_last_change;
  const stable = isPerformanceStable(metrics, req.time_based_max_cpl_increase_percent);

  const met = {
    conversions: conversions >= req.min_conversions,
    campaign_age: age >= req.min_days,
    cpl_stability: stability <= req.cpl_stability_threshold_percent,
    no_recent_changes: sinceChange >= req.no_changes_days,
    time_based_age: age >= req.time_based_min_days,
    time_based_conversions: conversions >= req.time_based_min_conversions,
    performance_stable: stable,
  };
  const standardPath = met.conversions && met.campaign_age && met.cpl_stability && met.no_recent_changes;
  const timeBasedPath = met.time_based_age && met.time_based_conversions && met.performance_stable;

  const blocking: string[] = [];
  if (!standardPath) {
    if (!met.conversions) {
      blocking.push(`Insufficient primary conversions: ${conversions}/${req.min_conversions}`);
    }
    if (!met.campaign_age) {
      blocking.push(`Campaign too new: ${age}/${req.min_days} days`);
    }
    if (!met.cpl_stability) {
      blocking.push(
        `CPL unstable: ${stability.toFixed(1)}% variation (max ${req.cpl_stability_threshold_percent}%)`
      );
    }
    if (!met.no_recent_changes) {
      blocking.push(`Recent changes detected: ${sinceChange} days ago (min ${req.no_changes_days} days)`);
    }
  }
  if (!timeBasedPath) {
    if (!met.time_based_age) {
      blocking.push(`Time-based path: campaign too new: ${age}/${req.time_based_min_days} days`);
    }
    if (!met.time_based_conversions) {
      blocking.push(
        `Time-based path: insufficient primary conversions: ${conversions}/${req.time_based_min_conversions}`
      );
    }
    if (!met.performance_stable) {
      blocking.push(
        `Time-based path: CPL up more than ${req.time_based_max_cpl_increase_percent}% over the 30-day baseline`
      );
    }
  }

  let path: ProgressionPath | null = null;
  if (standardPath) {
    path = 'STANDARD';
  } else if (timeBasedPath) {
    path = 'TIME_BASED';
  }

  const details: Phase1EligibilityDetails = {
    outcome: 'PHASE_1',
    blocking_factors: blocking,
    primary_conversions: conversions,
    secondary_conversions: metrics.secondary_conversions_count,
    campaign_age_days: age,
    cpl_stability_percent: stability,
    days_since_last_change: sinceChange,
    progression_path: path,
    requirements_met: {
      standard_path: standardPath,
      time_based_path: timeBasedPath,
      ...met,
    },
  };

  let action = 'Continue Phase 1 optimization - address blocking factors';
  if (path === 'STANDARD') {
    action = 'Safe to introduce tCPA at $100-$150 (standard progression)';
  } else if (path === 'TIME_BASED') {
    action = 'Safe to introduce tCPA at $100-$150 (time-based progression)';
  }

  return { eligible_for_next: path !== null, recommended_action: action, details };
}

function checkPhase2(metrics: PhaseMetrics, config: PhaseConfig): PhaseEligibilityResult {
  const req = config.phase_2;
  const blocking: string[] = [];

  const met = {
    tcpa_duration: metrics.days_under_tcpa >= req.min_tcpa_days,
    cpl_range: metrics.current_cpl >= req.cpl_min && metrics.current_cpl <= req.cpl_max,
    lead_quality: metrics.lead_quality_percent >= req.lead_quality_threshold_percent,
    pacing: metrics.current_pacing >= req.pacing_threshold,
  };

  if (!met.tcpa_duration) {
    blocking.push(`Insufficient tCPA time: ${metrics.days_under_tcpa}/${req.min_tcpa_days} days`);
  }
  if (metrics.current_cpl < req.cpl_min) {
    blocking.push(`CPL too low: $${metrics.current_cpl.toFixed(2)} (min $${req.cpl_min.toFixed(2)})`);
  } else if (metrics.current_cpl > req.cpl_max) {
    blocking.push(`CPL too high: $${metrics.current_cpl.toFixed(2)} (max $${req.cpl_max.toFixed(2)})`);
  }
  if (!met.lead_quality) {
    blocking.push(
      `Low lead quality: ${metrics.lead_quality_percent.toFixed(1)}% (min ${req.lead_quality_threshold_percent}% of leads tagged as 'serious')`
    );
  }
  if (!met.pacing) {
    blocking.push(
      `Pacing constrained: ${(metrics.current_pacing * 100).toFixed(1)}% (min ${(req.pacing_threshold * 100).toFixed(1)}%)`
    );
  }

  const details: Phase2EligibilityDetails = {
    outcome: 'PHASE_2',
    blocking_factors: blocking,
    days_under_tcpa: metrics.days_under_tcpa,
    current_cpl: metrics.current_cpl,
    lead_quality_percent: metrics.lead_quality_percent,
    current_pacing: metrics.current_pacing,
    requirements_met: met,
  };

  const eligible = blocking.length === 0;
  return {
    eligible_for_next: eligible,
    recommended_action: eligible
      ? 'Safe to scale budget by +20-30%'
      : 'Continue Phase 2 optimization - address blocking factors',
    details,
  };
}

function checkPhase3(metrics: PhaseMetrics, config: PhaseConfig): PhaseEligibilityResult {
  const req = config.phase_2;
  const opportunities: string[] = [];
  if (metrics.current_cpl > req.cpl_max) {
    opportunities.push('High CPL - consider tCPA adjustment');
  }
  if (metrics.current_pacing < req.pacing_threshold) {
    opportunities.push('Pacing constrained - consider budget increase');
  }
  if (metrics.lead_quality_percent < req.lead_quality_threshold_percent) {
    opportunities.push('Low lead quality - review targeting');
  }

  let action = 'Phase 3 optimization - focus on efficiency and scale';
  if (opportunities.length > 0) {
    action += ` | Opportunities: ${opportunities.join(', ')}`;
  }

  return {
    eligible_for_next: false,
    recommended_action: action,
    details: {
      outcome: 'PHASE_3',
      blocking_factors: [],
      optimization_opportunities: opportunities,
      current_cpl: metrics.current_cpl,
      current_pacing: metrics.current_pacing,
      lead_quality_percent: metrics.lead_quality_percent,
    },
  };
}

/**
 * Eligibility to advance from `phase`. Never throws.
 */
export function checkPhaseEligibility(
  metrics: PhaseMetrics,
  phase: CampaignPhase,
  config: PhaseConfig = getPhaseConfig()
): PhaseEligibilityResult {
  try {
    const hygiene = validateConversionMapping(metrics.primary_conversions);
    if (!hygiene.valid) {
      return {
        eligible_for_next: false,
        recommended_action: `Fix conversion mapping: ${hygiene.reason}`,
        details: {
          outcome: 'CONVERSION_HYGIENE_FAILED',
          blocking_factors: [hygiene.reason],
          conversion_hygiene_reason: hygiene.reason,
        },
      };
    }

    switch (phase) {
      case 'PHASE_1':
        return checkPhase1(metrics, config);
      case 'PHASE_2':
        return checkPhase2(metrics, config);
      case 'PHASE_3':
        return checkPhase3(metrics, config);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      eligible_for_next: false,
      recommended_action: `Error checking eligibility: ${message}`,
      details: { outcome: 'ERROR', blocking_factors: [], error: message },
    };
  }
}

function progressMessage(
  status: PhaseProgressStatus,
  eligible: boolean,
  days: number,
  expected: number,
  max: number,
  blockingFactors: string[]
): string {
  switch (status) {
    case 'ON_TRACK':
      return eligible
        ? `Phase on track and eligible for next phase (${expected - days} days before expected completion)`
        : `Phase progressing normally - ${expected - days} days remaining to expected completion`;
    case 'GRACE':
      return eligible
        ? 'Phase slightly behind but eligible for next phase'
        : `Phase slightly behind expected timeline (${days - expected} days over) - within grace period`;
    case 'LAGGING':
      return eligible
        ? `Phase lagging but eligible for next phase (${days - expected} days behind expected) - proceed`
        : `Phase lagging - ${days - expected} days past expected completion. Address blocking factors.`;
    case 'CRITICAL': {
      if (eligible) {
        return `CRITICAL: Phase exceeded maximum duration (${days - max} days over max) but eligible for next phase. Proceed immediately.`;
      }
      let message = `CRITICAL ALERT: Phase exceeded maximum duration by ${days - max} days!`;
      if (blockingFactors.length > 0) {
        message += ` Blocking factors: ${blockingFactors.join(', ')}`;
      }
      return `${message} Immediate action required.`;
    }
  }
}

/**
 * Days in phase against the phase timeline: ON_TRACK up to expected, GRACE
 * for the grace band after it, LAGGING up to max, CRITICAL beyond max.
 */
export function checkPhaseProgress(
  input: PhaseProgressInput,
  config: PhaseConfig = getPhaseConfig()
): PhaseProgressResult {
  const timeline = config.timelines[input.phase];
  const expected = input.expected_days ?? timeline.expected_days;
  const max = input.max_days ?? timeline.max_days;
  const days = utcDaysBetween(input.start_date, input.today);

  let status: PhaseProgressStatus;
  if (days <= expected) {
    status = 'ON_TRACK';
  } else if (days <= expected + config.grace_period_days) {
    status = 'GRACE';
  } else if (days <= max) {
    status = 'LAGGING';
  } else {
    status = 'CRITICAL';
  }

  const eligibility = input.eligibility;
  return {
    lagging: status === 'LAGGING' || status === 'CRITICAL',
    lag_alert: status === 'CRITICAL',
    days_in_phase: days,
    status,
    expected_days: expected,
    max_days: max,
    message: progressMessage(
      status,
      eligibility.eligible_for_next,
      days,
      expected,
      max,
      eligibility.details.blocking_factors
    ),
  };
}

export interface PhaseSummary {
  phase_1_requirements: PhaseConfig['phase_1'];
  phase_2_requirements: PhaseConfig['phase_2'];
  phase_timelines: PhaseConfig['timelines'];
  grace_period_days: number;
}

export function getPhaseSummary(config: PhaseConfig = getPhaseConfig()): PhaseSummary {
  return {
    phase_1_requirements: { ...config.phase_1 },
    phase_2_requirements: { ...config.phase_2 },
    phase_timelines: { ...config.timelines },
    grace_period_days: config.grace_period_days,
  };
}

/**
 * State machine bound to one phase config.
 */
export class PhaseStateMachine {
  private readonly config: PhaseConfig;

  constructor(config?: PhaseConfig) {
    this.config = config ?? getPhaseConfig();
  }

  checkEligibility(metrics: PhaseMetrics, phase: CampaignPhase): PhaseEligibilityResult {
    return checkPhaseEligibility(metrics, phase, this.config);
  }

  checkProgress(input: PhaseProgressInput): PhaseProgressResult {
    return checkPhaseProgress(input, this.config);
  }

  getSummary(): PhaseSummary {
    return getPhaseSummary(this.config);
  }
}
