/**
 * Unit tests for guardrailPolicyConfig
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildGuardrailPolicy,
  clearGuardrailPolicyCache,
  DEFAULT_GUARDRAIL_POLICY,
  DEFAULT_GUARDRAIL_POLICY_PATH,
  getGuardrailPolicy,
  getGuardrailSummary,
  loadGuardrailPolicy,
  setGuardrailPolicy,
} from '../../../config/guardrailPolicyConfig';
import { PolicyConfigError } from '../../../types/GuardrailErrors';

describe('guardrailPolicyConfig', () => {
  let tmpDir: string;
  let warnSpy: jest.SpyInstance;

  const writePolicy = (name: string, contents: string): string => {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, contents, 'utf-8');
    return filePath;
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'guardrail-policy-'));
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    clearGuardrailPolicyCache();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
    delete process.env.GUARDRAIL_POLICY_PATH;
    clearGuardrailPolicyCache();
  });

  describe('loadGuardrailPolicy', () => {
    it('loads the shipped policy file to the built-in defaults', () => {
      expect(loadGuardrailPolicy(DEFAULT_GUARDRAIL_POLICY_PATH)).toEqual(DEFAULT_GUARDRAIL_POLICY);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('merges a partial file onto the defaults', () => {
      const filePath = writePolicy(
        'partial.yaml',
        ['budget_limits:', '  max_daily: 400', 'change_controls:', '  change_window_hours: 4'].join('\n')
      );

      const policy = loadGuardrailPolicy(filePath);

      expect(policy.budget_limits).toEqual({ ...DEFAULT_GUARDRAIL_POLICY.budget_limits, max_daily: 400 });
      expect(policy.change_controls).toEqual({ change_window_hours: 4, one_lever_per_week_days: 7 });
      expect(policy.target_cpa_limits).toEqual(DEFAULT_GUARDRAIL_POLICY.target_cpa_limits);
    });

    it('replaces the URL exclusion list wholesale', () => {
      const filePath = writePolicy('urls.yaml', 'required_url_exclusions:\n  - /careers/*\n');

      expect(loadGuardrailPolicy(filePath).required_url_exclusions).toEqual(['/careers/*']);
    });

    it('replaces the geo exclusion list wholesale', () => {
      const filePath = writePolicy('geo.yaml', 'required_geo_exclusions: []\n');

      expect(loadGuardrailPolicy(filePath).required_geo_exclusions).toEqual([]);
    });

    it('falls back to defaults when the file is missing', () => {
      const policy = loadGuardrailPolicy(path.join(tmpDir, 'missing.yaml'));

      expect(policy).toEqual(DEFAULT_GUARDRAIL_POLICY);
      expect(warnSpy.mock.calls[0][0]).toContain('Guardrail policy file not found, using defaults');
    });

    it('falls back to defaults on a YAML syntax error', () => {
      const filePath = writePolicy('broken.yaml', 'budget_limits: [unclosed\n');

      expect(loadGuardrailPolicy(filePath)).toEqual(DEFAULT_GUARDRAIL_POLICY);
      expect(warnSpy.mock.calls[0][0]).toContain('Error parsing guardrail policy file, using defaults');
    });

    it('falls back to defaults when a field has the wrong type', () => {
      const filePath = writePolicy('types.yaml', 'budget_limits:\n  max_daily: lots\n');

      expect(loadGuardrailPolicy(filePath)).toEqual(DEFAULT_GUARDRAIL_POLICY);
      expect(warnSpy.mock.calls[0][0]).toContain('Guardrail policy file has wrong types, using defaults');
    });

    it('treats an empty file as no overrides', () => {
      const filePath = writePolicy('empty.yaml', '');

      expect(loadGuardrailPolicy(filePath)).toEqual(DEFAULT_GUARDRAIL_POLICY);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('rejects values the engine cannot enforce', () => {
      const filePath = writePolicy('invalid.yaml', 'budget_limits:\n  min_daily: 300\n');

      expect(() => loadGuardrailPolicy(filePath)).toThrow(PolicyConfigError);
      expect(() => loadGuardrailPolicy(filePath)).toThrow(
        'Invalid guardrail policy: budget_limits: min_daily must not exceed max_daily'
      );
    });

    it('reads GUARDRAIL_POLICY_PATH when no path is given', () => {
      process.env.GUARDRAIL_POLICY_PATH = writePolicy('env.yaml', 'safety_limits:\n  conversion_dry_spell_days: 10\n');

      expect(loadGuardrailPolicy().safety_limits.conversion_dry_spell_days).toBe(10);
    });
  });

  describe('buildGuardrailPolicy', () => {
    it('returns the defaults without overrides', () => {
      expect(buildGuardrailPolicy()).toEqual(DEFAULT_GUARDRAIL_POLICY);
    });

    it('collects every violation', () => {
      try {
        buildGuardrailPolicy({
          budget_limits: { max_adjustment_percent: 150 },
          geo_targeting_limits: { max_changes_per_period: 0 },
          safety_limits: { spend_multiplier_threshold: 0 },
        });
        throw new Error('expected PolicyConfigError');
      } catch (error) {
        expect(error).toBeInstanceOf(PolicyConfigError);
        expect(error).toHaveProperty('violations', [
          'budget_limits.max_adjustment_percent: Number must be less than or equal to 100',
          'geo_targeting_limits.max_changes_per_period: Number must be greater than or equal to 1',
          'safety_limits.spend_multiplier_threshold: Number must be greater than 0',
        ]);
      }
    });

    it('does not mutate the defaults', () => {
      const policy = buildGuardrailPolicy({ required_url_exclusions: ['/a'] });
      policy.budget_limits.max_daily = 999;

      expect(DEFAULT_GUARDRAIL_POLICY.budget_limits.max_daily).toBe(250);
      expect(DEFAULT_GUARDRAIL_POLICY.required_url_exclusions).toHaveLength(9);
    });
  });

  describe('cache', () => {
    it('returns the same policy until cleared', () => {
      const first = getGuardrailPolicy();

      expect(getGuardrailPolicy()).toBe(first);
      clearGuardrailPolicyCache();
      expect(getGuardrailPolicy()).not.toBe(first);
    });

    it('serves overrides set at runtime', () => {
      setGuardrailPolicy({ budget_limits: { max_daily: 500 } });

      expect(getGuardrailPolicy().budget_limits.max_daily).toBe(500);
    });

    it('refuses invalid runtime overrides', () => {
      expect(() => setGuardrailPolicy({ target_cpa_limits: { min_value: 400 } })).toThrow(
        'Invalid guardrail policy: target_cpa_limits: min_value must not exceed max_value'
      );
    });
  });

  describe('getGuardrailSummary', () => {
    it('flattens change controls', () => {
      const summary = getGuardrailSummary(buildGuardrailPolicy({ change_controls: { change_window_hours: 6 } }));

      expect(summary.change_window_hours).toBe(6);
      expect(summary.one_lever_per_week_days).toBe(7);
      expect(summary.safety_limits).toEqual({ spend_multiplier_threshold: 2, conversion_dry_spell_days: 14 });
    });
  });
});
