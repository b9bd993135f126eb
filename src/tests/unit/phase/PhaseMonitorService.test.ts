/**
 * Unit tests for PhaseMonitorService
 */

import { PhaseMonitorService } from '../../../services/phase/PhaseMonitorService';
import { PhaseStateMachine } from '../../../services/phase/PhaseStateMachine';
import { DEFAULT_PHASE_CONFIG } from '../../../config/phaseConfig';
import { Logger } from '../../../services/core/Logger';
import { IPhaseSnapshotProvider } from '../../../types/CollaboratorTypes';
import { INotificationSink } from '../../../types/NotificationTypes';
import { PhaseSnapshot } from '../../../types/PhaseTypes';
import { buildPhaseMetrics, NOW } from '../../fixtures/campaign-fixtures';

describe('PhaseMonitorService', () => {
  const fetchPhaseSnapshot = jest.fn<Promise<PhaseSnapshot>, [string]>();
  const notify = jest.fn();
  const provider: IPhaseSnapshotProvider = { fetchPhaseSnapshot };
  const sink: INotificationSink = { notify };

  const service = new PhaseMonitorService(
    provider,
    new PhaseStateMachine(DEFAULT_PHASE_CONFIG),
    sink,
    new Logger('PhaseMonitorService.test'),
    () => NOW
  );

  const snapshot = (overrides: Partial<PhaseSnapshot> = {}): PhaseSnapshot => ({
    campaign_id: 'campaign-1',
    phase: 'PHASE_1',
    phase_started_at: '2026-03-01',
    metrics: buildPhaseMetrics(),
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    notify.mockResolvedValue(true);
  });

  it('notifies PHASE_ADVANCE for an eligible campaign on track', async () => {
    fetchPhaseSnapshot.mockResolvedValue(snapshot());

    const report = await service.monitorCampaign('campaign-1');

    expect(fetchPhaseSnapshot).toHaveBeenCalledWith('campaign-1');
    expect(report.progress.days_in_phase).toBe(14);
    expect(report.progress.status).toBe('ON_TRACK');
    expect(report.notifications_sent).toEqual(['PHASE_ADVANCE']);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith('PHASE_ADVANCE', {
      campaign_id: 'campaign-1',
      current_phase: 'PHASE_1',
      next_phase: 'PHASE_2',
      recommended_action: 'Safe to introduce tCPA at $100-$150 (standard progression)',
    });
  });

  it('never notifies an advance from the terminal phase', async () => {
    fetchPhaseSnapshot.mockResolvedValue(snapshot({ phase: 'PHASE_3' }));

    const report = await service.monitorCampaign('campaign-1');

    expect(report.notifications_sent).toEqual([]);
    expect(notify).not.toHaveBeenCalled();
  });

  it('notifies PHASE_LAG for a lagging campaign', async () => {
    fetchPhaseSnapshot.mockResolvedValue(
      snapshot({ phase_started_at: '2026-02-15', metrics: buildPhaseMetrics({ primary_conversions_count: 10 }) })
    );

    const report = await service.monitorCampaign('campaign-1');

    expect(report.progress.days_in_phase).toBe(28);
    expect(report.notifications_sent).toEqual(['PHASE_LAG']);
    expect(notify).toHaveBeenCalledWith('PHASE_LAG', {
      campaign_id: 'campaign-1',
      phase: 'PHASE_1',
      days_in_phase: 28,
      expected_days: 21,
      status: 'LAGGING',
      message: 'Phase lagging - 7 days past expected completion. Address blocking factors.',
    });
  });

  it('notifies CRITICAL_LAG only, not PHASE_LAG, past the maximum duration', async () => {
    fetchPhaseSnapshot.mockResolvedValue(
      snapshot({ phase_started_at: '2026-02-01', metrics: buildPhaseMetrics({ primary_conversions_count: 10 }) })
    );

    const report = await service.monitorCampaign('campaign-1');

    expect(report.notifications_sent).toEqual(['CRITICAL_LAG']);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith(
      'CRITICAL_LAG',
      expect.objectContaining({
        campaign_id: 'campaign-1',
        days_in_phase: 42,
        max_days: 35,
        blocking_factors: [
          'Insufficient primary conversions: 10/30',
          'Time-based path: campaign too new: 20/60 days',
          'Time-based path: insufficient primary conversions: 10/15',
        ],
      })
    );
  });

  it('leaves undelivered notifications out of the report', async () => {
    fetchPhaseSnapshot.mockResolvedValue(snapshot());
    notify.mockResolvedValue(false);

    const report = await service.monitorCampaign('campaign-1');

    expect(notify).toHaveBeenCalledTimes(1);
    expect(report.notifications_sent).toEqual([]);
  });

  it('refuses a phase start that is not a calendar date instead of reporting lag', async () => {
    fetchPhaseSnapshot.mockResolvedValue(snapshot({ phase_started_at: '2026-13-45' }));

    const result = await service.monitorCampaigns(['campaign-1']);

    expect(result.reports).toEqual([]);
    expect(result.failures).toEqual([
      {
        campaign_id: 'campaign-1',
        error: 'Invalid PHASE snapshot for campaign campaign-1: phase_started_at is not a calendar date: 2026-13-45',
      },
    ]);
    expect(notify).not.toHaveBeenCalled();
  });

  it('keeps going when one campaign fails', async () => {
    fetchPhaseSnapshot
      .mockRejectedValueOnce(new Error('No PHASE snapshot for campaign: campaign-1'))
      .mockResolvedValueOnce(snapshot({ campaign_id: 'campaign-2' }));

    const result = await service.monitorCampaigns(['campaign-1', 'campaign-2']);

    expect(result.failures).toEqual([
      { campaign_id: 'campaign-1', error: 'No PHASE snapshot for campaign: campaign-1' },
    ]);
    expect(result.reports).toHaveLength(1);
    expect(result.reports[0].campaign_id).toBe('campaign-2');
  });
});
