/**
 * Campaign change governance
 *
 * Library entry point. Production execution happens via the Lambda handlers
 * under handlers/governance.
 */

export * from './types/ChangeRequestTypes';
export * from './types/CampaignStateTypes';
export * from './types/GuardrailTypes';
export * from './types/PhaseTypes';
export * from './types/PendingChangeTypes';
export * from './types/NotificationTypes';
export * from './types/CollaboratorTypes';
export * from './types/GuardrailErrors';
export {
  ChangeRequestSchema,
  CampaignStateSchema,
  PhaseMetricsSchema,
  PhaseSnapshotSchema,
  PendingChangeRecordSchema,
} from './types/CampaignSchemas';

export {
  DEFAULT_GUARDRAIL_POLICY,
  buildGuardrailPolicy,
  loadGuardrailPolicy,
  getGuardrailPolicy,
  setGuardrailPolicy,
  getGuardrailSummary,
} from './config/guardrailPolicyConfig';
export type { GuardrailPolicyOverrides, GuardrailSummary } from './config/guardrailPolicyConfig';
export { DEFAULT_PHASE_CONFIG, getPhaseConfig, setPhaseConfig } from './config/phaseConfig';
export type { PhaseConfigOverrides } from './config/phaseConfig';

export { enforceGuardrails, GuardrailEngine } from './services/guardrails/GuardrailEngine';
export {
  checkPhaseEligibility,
  checkPhaseProgress,
  getPhaseSummary,
  PhaseStateMachine,
} from './services/phase/PhaseStateMachine';
export type { PhaseSummary } from './services/phase/PhaseStateMachine';
export { PhaseMonitorService } from './services/phase/PhaseMonitorService';
export { ChangeGovernanceService } from './services/changes/ChangeGovernanceService';
export { PendingChangeRunner } from './services/changes/PendingChangeRunner';
export { PendingChangeStore } from './services/changes/PendingChangeStore';
export { EventBridgeNotificationSink } from './services/notifications/EventBridgeNotificationSink';
export { DynamoCampaignDataProvider } from './adapters/campaign/DynamoCampaignDataProvider';
export { EventBridgeChangeExecutor } from './adapters/ads/EventBridgeChangeExecutor';
export { Logger } from './services/core/Logger';
