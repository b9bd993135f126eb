/**
 * Event envelope for everything the governance service publishes to
 * EventBridge. Detail carries the envelope as-is.
 */

export type EventSource = 'notifications' | 'executor';

export interface EventEnvelope<P = Record<string, unknown>> {
  source: EventSource;
  eventType: string;
  campaignId: string;
  ts: string;
  payload: P;
}

/** Detail type of the event the platform adapter consumes to apply a change. */
export const CHANGE_EXECUTION_REQUESTED = 'ChangeExecutionRequested';

/** Detail types the change-request handler accepts. */
export const CHANGE_REQUEST_SUBMITTED = 'ChangeRequestSubmitted';
export const CHANGE_CANCEL_REQUESTED = 'ChangeCancelRequested';

export function createEventSource(source: EventSource): string {
  return `pmax-governance.${source}`;
}
