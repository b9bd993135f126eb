import { CampaignState } from '../../types/CampaignStateTypes';
import { SafetyLimits } from '../../types/GuardrailTypes';

export interface StopLossResult {
  /** Every stop-loss alert that fired, spend alert first. */
  alerts: string[];
  /** Set when the conversion dry spell fires; blocks all changes. */
  freeze_alert: string | null;
}

/**
 * Wasted-spend and conversion dry-spell detection. Pure.
 */
export function checkSafetyStopLoss(state: CampaignState, limits: SafetyLimits): StopLossResult {
  const alerts: string[] = [];
  let freezeAlert: string | null = null;

  const threshold = state.daily_budget * limits.spend_multiplier_threshold;
  if (
    state.daily_budget > 0 &&
    state.recent_7d_spend > threshold &&
    state.recent_7d_conversions === 0
  ) {
    alerts.push(
      `STOP-LOSS: Spend $${state.recent_7d_spend.toFixed(2)} exceeds ${limits.spend_multiplier_threshold}x budget with 0 conversions - propose pause`
    );
  }

  if (state.days_since_last_conversion >= limits.conversion_dry_spell_days) {
    freezeAlert = `STOP-LOSS: No conversions in ${state.days_since_last_conversion} days - freeze all changes`;
    alerts.push(freezeAlert);
  }

  return { alerts, freeze_alert: freezeAlert };
}
