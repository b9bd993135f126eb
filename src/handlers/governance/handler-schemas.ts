/**
 * Event detail schemas for the governance handlers. No env or side effects,
 * so tests can import here without triggering handler requireEnv().
 */

import { z } from 'zod';

export { ChangeRequestSchema } from '../../types/CampaignSchemas';

export const CancelChangeDetailSchema = z.object({
  change_id: z.string().min(1, 'change_id is required'),
  reason: z.string().min(1).optional(),
}).strict();

/** Optional detail on the scheduled phase-monitor rule; overrides MONITORED_CAMPAIGN_IDS. */
export const PhaseMonitorDetailSchema = z.object({
  campaign_ids: z.array(z.string().min(1)).optional(),
});

export function validationError(handlerName: string, issues: string[]): Error {
  const error = new Error(`[${handlerName}] Invalid event detail: ${issues.join('; ')}`);
  error.name = 'ValidationError';
  return error;
}
