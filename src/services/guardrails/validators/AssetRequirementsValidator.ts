import { AssetGroupState } from '../../../types/CampaignStateTypes';
import { AssetRequirements } from '../../../types/GuardrailTypes';

/**
 * Asset formats an asset group is short of, e.g. "headlines (3/5)".
 * Empty when the group meets every minimum.
 */
export function findMissingAssets(group: AssetGroupState, requirements: AssetRequirements): string[] {
  const counts = group.asset_counts;
  const missing: string[] = [];

  const check = (label: string, have: number, min: number): void => {
    if (have < min) {
      missing.push(`${label} (${have}/${min})`);
    }
  };

  check('headlines', counts.headlines, requirements.headlines);
  check('long headlines', counts.long_headlines, requirements.long_headlines);
  check('descriptions', counts.descriptions, requirements.descriptions);
  if (requirements.business_name_required && counts.business_name < 1) {
    missing.push('business name');
  }
  check('1:1 logos', counts.logos_1_1, requirements.logos_1_1);
  check('4:1 logos', counts.logos_4_1, requirements.logos_4_1);
  check('1.91:1 images', counts.images_1_91_1, requirements.images_1_91_1);
  check('1:1 images', counts.images_1_1, requirements.images_1_1);

  const videoCovered = group.auto_generate_video && requirements.auto_generated_video_allowed;
  if (!videoCovered) {
    check('vertical videos', counts.vertical_videos, requirements.vertical_videos);
  }

  return missing;
}

/**
 * One entry per ENABLED group that falls short: `[name, missing[]]`.
 */
export function findEnabledGroupShortfalls(
  groups: AssetGroupState[],
  requirements: AssetRequirements
): Array<[string, string[]]> {
  const shortfalls: Array<[string, string[]]> = [];
  for (const group of groups) {
    if (group.status !== 'ENABLED') {
      continue;
    }
    const missing = findMissingAssets(group, requirements);
    if (missing.length > 0) {
      shortfalls.push([group.name, missing]);
    }
  }
  return shortfalls;
}
