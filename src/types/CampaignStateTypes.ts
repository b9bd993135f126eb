/**
 * Point-in-time campaign snapshot consumed by the guardrail engine.
 * Supplied by an ICampaignDataProvider; never mutated by the core.
 */

export type AssetGroupStatus = 'ENABLED' | 'PAUSED' | 'REMOVED';

export type GeoTargetingType = 'PRESENCE_ONLY' | 'PRESENCE_OR_INTEREST' | 'SEARCH_INTEREST';

export const LEAD_FORM_SUBMISSION = 'Lead Form Submission';

export interface AssetCounts {
  headlines: number;
  long_headlines: number;
  descriptions: number;
  business_name: number;
  logos_1_1: number;
  logos_4_1: number;
  images_1_91_1: number;
  images_1_1: number;
  vertical_videos: number;
}

export interface AssetGroupState {
  name: string;
  status: AssetGroupStatus;
  asset_counts: AssetCounts;
  /** Platform may auto-generate a video when none is uploaded. */
  auto_generate_video: boolean;
}

export interface CampaignState {
  campaign_id: string;
  daily_budget: number;
  target_cpa: number | null;
  total_conversions: number;
  recent_7d_conversions: number;
  recent_7d_spend: number;
  days_since_last_conversion: number;
  last_budget_change_at: string | null;
  last_target_cpa_change_at: string | null;
  last_geo_change_at: string | null;
  /** Geo targeting changes made within the policy's trailing period_days. */
  geo_changes_in_period: number;
  last_major_change_at: string | null;
  asset_groups: AssetGroupState[];
  url_exclusions: string[];
  primary_conversions: string[];
  secondary_conversions: string[];
  geo_targeting_type: GeoTargetingType;
  geo_exclusions: string[];
}
