/**
 * Guardrail policy config: YAML file → typed-override check → merge onto
 * defaults → value check.
 *
 * A missing file, a YAML syntax error or a wrongly-typed document falls back
 * to DEFAULT_GUARDRAIL_POLICY with a warning. A well-typed document whose
 * values cannot be enforced (negative limits, min above max) throws
 * PolicyConfigError.
 *
 * The parsed policy is cached in memory for Lambda warm starts.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../services/core/Logger';
import { GuardrailPolicy } from '../types/GuardrailTypes';
import { PolicyConfigError } from '../types/GuardrailErrors';
import { formatZodIssues } from '../types/CampaignSchemas';

const logger = new Logger('GuardrailPolicyConfig');

export const DEFAULT_GUARDRAIL_POLICY_PATH = path.join(__dirname, '../../config/guardrails.yaml');

export const DEFAULT_GUARDRAIL_POLICY: GuardrailPolicy = {
  budget_limits: {
    min_daily: 30,
    max_daily: 250,
    max_adjustment_percent: 30,
    min_adjustment_percent: 20,
    max_frequency_days: 7,
  },
  target_cpa_limits: {
    min_value: 80,
    max_value: 350,
    max_adjustment_percent: 15,
    min_adjustment_percent: 10,
    max_frequency_days: 14,
    min_conversions: 30,
  },
  asset_requirements: {
    headlines: 5,
    long_headlines: 1,
    descriptions: 2,
    business_name_required: true,
    logos_1_1: 1,
    logos_4_1: 1,
    images_1_91_1: 3,
    images_1_1: 3,
    vertical_videos: 1,
    auto_generated_video_allowed: true,
  },
  geo_targeting_limits: {
    presence_only_required: true,
    max_changes_per_period: 1,
    period_days: 21,
  },
  safety_limits: {
    spend_multiplier_threshold: 2.0,
    conversion_dry_spell_days: 14,
  },
  change_controls: {
    change_window_hours: 2,
    one_lever_per_week_days: 7,
  },
  required_url_exclusions: [
    '/buyers/*',
    '/sellers/*',
    '/featured-listings/*',
    '/contact/*',
    '/blog/*',
    '/property-search/*',
    '/idx/*',
    '/privacy/*',
    '/about/*',
  ],
  required_geo_exclusions: ['India', 'Pakistan', 'Bangladesh', 'Philippines'],
};

/** Type-only shape of a policy file. Every section and field is optional. */
const GuardrailPolicyOverridesSchema = z.object({
  budget_limits: z.object({
    min_daily: z.number(),
    max_daily: z.number(),
    max_adjustment_percent: z.number(),
    min_adjustment_percent: z.number(),
    max_frequency_days: z.number(),
  }).partial().optional(),
  target_cpa_limits: z.object({
    min_value: z.number(),
    max_value: z.number(),
    max_adjustment_percent: z.number(),
    min_adjustment_percent: z.number(),
    max_frequency_days: z.number(),
    min_conversions: z.number(),
  }).partial().optional(),
  asset_requirements: z.object({
    headlines: z.number(),
    long_headlines: z.number(),
    descriptions: z.number(),
    business_name_required: z.boolean(),
    logos_1_1: z.number(),
    logos_4_1: z.number(),
    images_1_91_1: z.number(),
    images_1_1: z.number(),
    vertical_videos: z.number(),
    auto_generated_video_allowed: z.boolean(),
  }).partial().optional(),
  geo_targeting_limits: z.object({
    presence_only_required: z.boolean(),
    max_changes_per_period: z.number(),
    period_days: z.number(),
  }).partial().optional(),
  safety_limits: z.object({
    spend_multiplier_threshold: z.number(),
    conversion_dry_spell_days: z.number(),
  }).partial().optional(),
  change_controls: z.object({
    change_window_hours: z.number(),
    one_lever_per_week_days: z.number(),
  }).partial().optional(),
  required_url_exclusions: z.array(z.string()).optional(),
  required_geo_exclusions: z.array(z.string()).optional(),
});

export type GuardrailPolicyOverrides = z.infer<typeof GuardrailPolicyOverridesSchema>;

const nonNegative = z.number().finite().nonnegative();
const percent = z.number().finite().min(0).max(100);

/** Value constraints the engine relies on. */
const GuardrailPolicySchema = z.object({
  budget_limits: z.object({
    min_daily: nonNegative,
    max_daily: nonNegative,
    max_adjustment_percent: percent,
    min_adjustment_percent: percent,
    max_frequency_days: nonNegative,
  }).refine((v) => v.min_daily <= v.max_daily, {
    message: 'min_daily must not exceed max_daily',
  }).refine((v) => v.min_adjustment_percent <= v.max_adjustment_percent, {
    message: 'min_adjustment_percent must not exceed max_adjustment_percent',
  }),
  target_cpa_limits: z.object({
    min_value: nonNegative,
    max_value: nonNegative,
    max_adjustment_percent: percent,
    min_adjustment_percent: percent,
    max_frequency_days: nonNegative,
    min_conversions: nonNegative,
  }).refine((v) => v.min_value <= v.max_value, {
    message: 'min_value must not exceed max_value',
  }).refine((v) => v.min_adjustment_percent <= v.max_adjustment_percent, {
    message: 'min_adjustment_percent must not exceed max_adjustment_percent',
  }),
  asset_requirements: z.object({
    headlines: nonNegative,
    long_headlines: nonNegative,
    descriptions: nonNegative,
    business_name_required: z.boolean(),
    logos_1_1: nonNegative,
    logos_4_1: nonNegative,
    images_1_91_1: nonNegative,
    images_1_1: nonNegative,
    vertical_videos: nonNegative,
    auto_generated_video_allowed: z.boolean(),
  }),
  geo_targeting_limits: z.object({
    presence_only_required: z.boolean(),
    max_changes_per_period: z.number().int().min(1),
    period_days: nonNegative,
  }),
  safety_limits: z.object({
    spend_multiplier_threshold: z.number().finite().positive(),
    conversion_dry_spell_days: nonNegative,
  }),
  change_controls: z.object({
    change_window_hours: nonNegative,
    one_lever_per_week_days: nonNegative,
  }),
  required_url_exclusions: z.array(z.string().min(1)),
  required_geo_exclusions: z.array(z.string().min(1)),
});

function mergeOverrides(overrides: GuardrailPolicyOverrides): GuardrailPolicy {
  const base = DEFAULT_GUARDRAIL_POLICY;
  return {
    budget_limits: { ...base.budget_limits, ...overrides.budget_limits },
    target_cpa_limits: { ...base.target_cpa_limits, ...overrides.target_cpa_limits },
    asset_requirements: { ...base.asset_requirements, ...overrides.asset_requirements },
    geo_targeting_limits: { ...base.geo_targeting_limits, ...overrides.geo_targeting_limits },
    safety_limits: { ...base.safety_limits, ...overrides.safety_limits },
    change_controls: { ...base.change_controls, ...overrides.change_controls },
    required_url_exclusions: [...(overrides.required_url_exclusions ?? base.required_url_exclusions)],
    required_geo_exclusions: [...(overrides.required_geo_exclusions ?? base.required_geo_exclusions)],
  };
}

/**
 * Merge overrides onto the defaults and check the result.
 * @throws PolicyConfigError when a value cannot be enforced
 */
export function buildGuardrailPolicy(overrides: GuardrailPolicyOverrides = {}): GuardrailPolicy {
  const merged = mergeOverrides(overrides);
  const result = GuardrailPolicySchema.safeParse(merged);
  if (!result.success) {
    throw new PolicyConfigError(formatZodIssues(result.error));
  }
  return merged;
}

function readOverrides(filePath: string): GuardrailPolicyOverrides {
  if (!fs.existsSync(filePath)) {
    logger.warn('Guardrail policy file not found, using defaults', { filePath });
    return {};
  }

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn('Error parsing guardrail policy file, using defaults', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (document === undefined || document === null) {
    return {};
  }

  const parsed = GuardrailPolicyOverridesSchema.safeParse(document);
  if (!parsed.success) {
    logger.warn('Guardrail policy file has wrong types, using defaults', {
      filePath,
      issues: formatZodIssues(parsed.error),
    });
    return {};
  }
  return parsed.data;
}

/**
 * Load the policy from a YAML file. Does not touch the cache.
 * @throws PolicyConfigError when the file's values cannot be enforced
 */
export function loadGuardrailPolicy(filePath?: string): GuardrailPolicy {
  const resolved = filePath || process.env.GUARDRAIL_POLICY_PATH || DEFAULT_GUARDRAIL_POLICY_PATH;
  const policy = buildGuardrailPolicy(readOverrides(resolved));
  logger.debug('Guardrail policy loaded', { filePath: resolved });
  return policy;
}

let cachedPolicy: GuardrailPolicy | null = null;

export function getGuardrailPolicy(): GuardrailPolicy {
  if (!cachedPolicy) {
    cachedPolicy = loadGuardrailPolicy();
  }
  return cachedPolicy;
}

export function setGuardrailPolicy(overrides: GuardrailPolicyOverrides): void {
  cachedPolicy = buildGuardrailPolicy(overrides);
}

export function clearGuardrailPolicyCache(): void {
  cachedPolicy = null;
}

export interface GuardrailSummary {
  budget_limits: GuardrailPolicy['budget_limits'];
  target_cpa_limits: GuardrailPolicy['target_cpa_limits'];
  asset_requirements: GuardrailPolicy['asset_requirements'];
  geo_targeting_limits: GuardrailPolicy['geo_targeting_limits'];
  safety_limits: GuardrailPolicy['safety_limits'];
  change_window_hours: number;
  one_lever_per_week_days: number;
  required_url_exclusions: string[];
  required_geo_exclusions: string[];
}

/**
 * Effective limits, flattened for display.
 */
export function getGuardrailSummary(policy: GuardrailPolicy = getGuardrailPolicy()): GuardrailSummary {
  return {
    budget_limits: { ...policy.budget_limits },
    target_cpa_limits: { ...policy.target_cpa_limits },
    asset_requirements: { ...policy.asset_requirements },
    geo_targeting_limits: { ...policy.geo_targeting_limits },
    safety_limits: { ...policy.safety_limits },
    change_window_hours: policy.change_controls.change_window_hours,
    one_lever_per_week_days: policy.change_controls.one_lever_per_week_days,
    required_url_exclusions: [...policy.required_url_exclusions],
    required_geo_exclusions: [...policy.required_geo_exclusions],
  };
}
