/**
 * Phase progression thresholds and timelines.
 */

import { PhaseConfig } from '../types/PhaseTypes';

export const DEFAULT_PHASE_CONFIG: PhaseConfig = {
  phase_1: {
    min_conversions: 30,
    min_days: 14,
    cpl_stability_threshold_percent: 20,
    no_changes_days: 7,
    time_based_min_days: 60,
    time_based_min_conversions: 15,
    time_based_max_cpl_increase_percent: 20,
  },
  phase_2: {
    min_tcpa_days: 30,
    cpl_min: 80,
    cpl_max: 150,
    lead_quality_threshold_percent: 5,
    pacing_threshold: 0.8,
  },
  timelines: {
    PHASE_1: { expected_days: 21, max_days: 35 },
    PHASE_2: { expected_days: 45, max_days: 70 },
    PHASE_3: { expected_days: 90, max_days: 365 },
  },
  grace_period_days: 3,
};

export interface PhaseConfigOverrides {
  phase_1?: Partial<PhaseConfig['phase_1']>;
  phase_2?: Partial<PhaseConfig['phase_2']>;
  timelines?: Partial<PhaseConfig['timelines']>;
  grace_period_days?: number;
}

let config: PhaseConfig = DEFAULT_PHASE_CONFIG;

export function getPhaseConfig(): PhaseConfig {
  return config;
}

/** Overrides apply on top of the defaults, not on top of earlier overrides. */
export function setPhaseConfig(overrides: PhaseConfigOverrides): void {
  config = {
    phase_1: { ...DEFAULT_PHASE_CONFIG.phase_1, ...overrides.phase_1 },
    phase_2: { ...DEFAULT_PHASE_CONFIG.phase_2, ...overrides.phase_2 },
    timelines: { ...DEFAULT_PHASE_CONFIG.timelines, ...overrides.timelines },
    grace_period_days: overrides.grace_period_days ?? DEFAULT_PHASE_CONFIG.grace_period_days,
  };
}

export function resetPhaseConfig(): void {
  config = DEFAULT_PHASE_CONFIG;
}
