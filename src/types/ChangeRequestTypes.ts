/**
 * Change requests: proposed mutations to a Performance Max campaign.
 * Constructed by the caller, immutable, evaluated by the guardrail engine.
 */

export type ChangeKind =
  | 'BUDGET_ADJUSTMENT'
  | 'TARGET_CPA_ADJUSTMENT'
  | 'ASSET_GROUP_MODIFICATION'
  | 'GEO_TARGETING_MODIFICATION'
  | 'CAMPAIGN_PAUSE'
  | 'CAMPAIGN_ENABLE';

export type AssetGroupAction =
  | 'PAUSE_ALL'
  | 'PAUSE_GROUP'
  | 'ENABLE_GROUP'
  | 'ADD_ASSETS'
  | 'REMOVE_ASSETS';

export type GeoTargetingAction =
  | 'ADD_LOCATION'
  | 'REMOVE_LOCATION'
  | 'ADD_EXCLUSION'
  | 'REMOVE_EXCLUSION';

interface ChangeRequestBase {
  readonly campaign_id: string;
  readonly requested_by?: string;
}

export interface BudgetAdjustmentRequest extends ChangeRequestBase {
  readonly kind: 'BUDGET_ADJUSTMENT';
  readonly new_daily_budget: number;
}

export interface TargetCpaAdjustmentRequest extends ChangeRequestBase {
  readonly kind: 'TARGET_CPA_ADJUSTMENT';
  readonly new_target_cpa: number;
}

export interface AssetGroupModificationRequest extends ChangeRequestBase {
  readonly kind: 'ASSET_GROUP_MODIFICATION';
  readonly action: AssetGroupAction;
  readonly asset_group_name?: string;
}

export interface GeoTargetingModificationRequest extends ChangeRequestBase {
  readonly kind: 'GEO_TARGETING_MODIFICATION';
  readonly action: GeoTargetingAction;
  readonly location?: string;
  /** Targeting mode of the location being added, e.g. "presence" or "presence_or_interest". */
  readonly location_type?: string;
}

export interface CampaignPauseRequest extends ChangeRequestBase {
  readonly kind: 'CAMPAIGN_PAUSE';
}

export interface CampaignEnableRequest extends ChangeRequestBase {
  readonly kind: 'CAMPAIGN_ENABLE';
}

export type ChangeRequest =
  | BudgetAdjustmentRequest
  | TargetCpaAdjustmentRequest
  | AssetGroupModificationRequest
  | GeoTargetingModificationRequest
  | CampaignPauseRequest
  | CampaignEnableRequest;
