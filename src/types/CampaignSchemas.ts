/**
 * Runtime schemas for records that cross the process boundary
 * (event payloads, DynamoDB items). No env or side effects.
 */

import { z } from 'zod';

const campaignId = z.string().min(1, 'campaign_id is required');
const requestedBy = z.string().min(1).optional();
const isoTimestamp = z.string().nullable();

export const ChangeRequestSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('BUDGET_ADJUSTMENT'),
    campaign_id: campaignId,
    requested_by: requestedBy,
    new_daily_budget: z.number().finite(),
  }).strict(),
  z.object({
    kind: z.literal('TARGET_CPA_ADJUSTMENT'),
    campaign_id: campaignId,
    requested_by: requestedBy,
    new_target_cpa: z.number().finite(),
  }).strict(),
  z.object({
    kind: z.literal('ASSET_GROUP_MODIFICATION'),
    campaign_id: campaignId,
    requested_by: requestedBy,
    action: z.enum(['PAUSE_ALL', 'PAUSE_GROUP', 'ENABLE_GROUP', 'ADD_ASSETS', 'REMOVE_ASSETS']),
    asset_group_name: z.string().min(1).optional(),
  }).strict(),
  z.object({
    kind: z.literal('GEO_TARGETING_MODIFICATION'),
    campaign_id: campaignId,
    requested_by: requestedBy,
    action: z.enum(['ADD_LOCATION', 'REMOVE_LOCATION', 'ADD_EXCLUSION', 'REMOVE_EXCLUSION']),
    location: z.string().min(1).optional(),
    location_type: z.string().min(1).optional(),
  }).strict(),
  z.object({
    kind: z.literal('CAMPAIGN_PAUSE'),
    campaign_id: campaignId,
    requested_by: requestedBy,
  }).strict(),
  z.object({
    kind: z.literal('CAMPAIGN_ENABLE'),
    campaign_id: campaignId,
    requested_by: requestedBy,
  }).strict(),
]);

const AssetCountsSchema = z.object({
  headlines: z.number().int().nonnegative(),
  long_headlines: z.number().int().nonnegative(),
  descriptions: z.number().int().nonnegative(),
  business_name: z.number().int().nonnegative(),
  logos_1_1: z.number().int().nonnegative(),
  logos_4_1: z.number().int().nonnegative(),
  images_1_91_1: z.number().int().nonnegative(),
  images_1_1: z.number().int().nonnegative(),
  vertical_videos: z.number().int().nonnegative(),
});

export const CampaignStateSchema = z.object({
  campaign_id: campaignId,
  daily_budget: z.number().nonnegative(),
  target_cpa: z.number().nonnegative().nullable(),
  total_conversions: z.number().int().nonnegative(),
  recent_7d_conversions: z.number().int().nonnegative(),
  recent_7d_spend: z.number().nonnegative(),
  days_since_last_conversion: z.number().int().nonnegative(),
  last_budget_change_at: isoTimestamp,
  last_target_cpa_change_at: isoTimestamp,
  last_geo_change_at: isoTimestamp,
  geo_changes_in_period: z.number().int().nonnegative().default(0),
  last_major_change_at: isoTimestamp,
  asset_groups: z.array(
    z.object({
      name: z.string(),
      status: z.enum(['ENABLED', 'PAUSED', 'REMOVED']),
      asset_counts: AssetCountsSchema,
      auto_generate_video: z.boolean(),
    })
  ),
  url_exclusions: z.array(z.string()),
  primary_conversions: z.array(z.string()),
  secondary_conversions: z.array(z.string()),
  geo_targeting_type: z.enum(['PRESENCE_ONLY', 'PRESENCE_OR_INTEREST', 'SEARCH_INTEREST']),
  geo_exclusions: z.array(z.string()),
});

export const PhaseMetricsSchema = z.object({
  primary_conversions: z.array(z.string()),
  secondary_conversions: z.array(z.string()),
  primary_conversions_count: z.number().nonnegative(),
  secondary_conversions_count: z.number().nonnegative(),
  campaign_age_days: z.number().nonnegative(),
  cpl_7d: z.number().nonnegative(),
  cpl_30d: z.number().nonnegative(),
  days_since_last_change: z.number().nonnegative(),
  days_under_tcpa: z.number().nonnegative(),
  current_cpl: z.number().nonnegative(),
  lead_quality_percent: z.number().min(0).max(100),
  current_pacing: z.number().nonnegative(),
});

export const PhaseSnapshotSchema = z.object({
  campaign_id: campaignId,
  phase: z.enum(['PHASE_1', 'PHASE_2', 'PHASE_3']),
  phase_started_at: z.string().date('phase_started_at must be a calendar date (YYYY-MM-DD)'),
  metrics: PhaseMetricsSchema,
});

const ApprovedVerdictSchema = z.object({
  decision: z.literal('APPROVED'),
  reasons: z.array(z.string()),
  alerts: z.array(z.string()),
  execute_after: z.string(),
});

export const PendingChangeRecordSchema = z.object({
  change_id: z.string().min(1),
  campaign_id: campaignId,
  change_request: ChangeRequestSchema,
  verdict: ApprovedVerdictSchema,
  execute_after: z.string(),
  status: z.enum(['PENDING', 'EXECUTED', 'CANCELLED', 'FAILED']),
  version: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
  executed_at: z.string().optional(),
  execution_ref: z.string().optional(),
  cancelled_at: z.string().optional(),
  cancel_reason: z.string().optional(),
  failed_at: z.string().optional(),
  failure_reason: z.string().optional(),
});

/**
 * Flatten zod issues to "path: message" strings for error messages and logs.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
