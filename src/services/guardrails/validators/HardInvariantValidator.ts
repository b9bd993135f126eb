/**
 * Hard invariants: conditions on the current campaign state that block every
 * change kind while violated.
 */

import { CampaignState, LEAD_FORM_SUBMISSION } from '../../../types/CampaignStateTypes';
import { GuardrailPolicy } from '../../../types/GuardrailTypes';
import { findEnabledGroupShortfalls } from './AssetRequirementsValidator';

export type ValidationOutcome = { valid: true } | { valid: false; reason: string };

export interface InvariantCheckResult {
  passed: boolean;
  reasons: string[];
}

/**
 * Primary conversions must be exactly {"Lead Form Submission"}.
 * Also the phase-gate precondition.
 */
export function validateConversionMapping(primaryConversions: string[]): ValidationOutcome {
  const invalid = primaryConversions.filter((name) => name !== LEAD_FORM_SUBMISSION);
  if (invalid.length > 0) {
    return {
      valid: false,
      reason: `Invalid primary conversions: ${invalid.join(', ')}. Only ${LEAD_FORM_SUBMISSION} can be Primary.`,
    };
  }
  if (!primaryConversions.includes(LEAD_FORM_SUBMISSION)) {
    return {
      valid: false,
      reason: `${LEAD_FORM_SUBMISSION} must be marked as Primary conversion.`,
    };
  }
  return { valid: true };
}

export function validateUrlExclusions(current: string[], required: string[]): ValidationOutcome {
  const missing = required.filter((url) => !current.includes(url));
  const unexpected = current.filter((url) => !required.includes(url));
  if (missing.length === 0 && unexpected.length === 0) {
    return { valid: true };
  }

  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(`missing ${missing.join(', ')}`);
  }
  if (unexpected.length > 0) {
    parts.push(`unexpected ${unexpected.join(', ')}`);
  }
  return {
    valid: false,
    reason: `URL exclusions must match the required list: ${parts.join('; ')}`,
  };
}

export function validateGeoExclusions(current: string[], required: string[]): ValidationOutcome {
  const missing = required.filter((location) => !current.includes(location));
  if (missing.length === 0) {
    return { valid: true };
  }
  return { valid: false, reason: `Missing presence-only exclusions: ${missing.join(', ')}` };
}

export function checkHardInvariants(state: CampaignState, policy: GuardrailPolicy): InvariantCheckResult {
  const reasons: string[] = [];

  const mapping = validateConversionMapping(state.primary_conversions);
  if (!mapping.valid) {
    reasons.push(mapping.reason);
  }

  const exclusions = validateUrlExclusions(state.url_exclusions, policy.required_url_exclusions);
  if (!exclusions.valid) {
    reasons.push(exclusions.reason);
  }

  if (policy.geo_targeting_limits.presence_only_required && state.geo_targeting_type !== 'PRESENCE_ONLY') {
    reasons.push(`Targeting type must be PRESENCE_ONLY, found: ${state.geo_targeting_type}`);
  }

  if (policy.geo_targeting_limits.presence_only_required) {
    const geoExclusions = validateGeoExclusions(state.geo_exclusions, policy.required_geo_exclusions);
    if (!geoExclusions.valid) {
      reasons.push(geoExclusions.reason);
    }
  }

  for (const [name, missing] of findEnabledGroupShortfalls(state.asset_groups, policy.asset_requirements)) {
    reasons.push(`Asset group '${name}' missing: ${missing.join(', ')}`);
  }

  return { passed: reasons.length === 0, reasons };
}
