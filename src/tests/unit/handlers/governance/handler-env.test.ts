import { parseCampaignIds, requireEnv } from '../../../../handlers/governance/handler-env';
import { validationError } from '../../../../handlers/governance/handler-schemas';

describe('handler-env', () => {
  describe('requireEnv', () => {
    it('returns the value when set', () => {
      expect(requireEnv('PENDING_CHANGES_TABLE_NAME', 'TestHandler')).toBe('test-pending-changes');
    });

    it('throws a ConfigurationError naming the handler and variable', () => {
      expect(() => requireEnv('NOT_A_REAL_VARIABLE', 'TestHandler')).toThrow(
        '[TestHandler] Missing required environment variable: NOT_A_REAL_VARIABLE.'
      );
      try {
        requireEnv('NOT_A_REAL_VARIABLE', 'TestHandler');
      } catch (error) {
        expect(error).toHaveProperty('name', 'ConfigurationError');
      }
    });
  });

  describe('parseCampaignIds', () => {
    it('splits, trims and drops blanks', () => {
      expect(parseCampaignIds(' campaign-1, ,campaign-2 ,')).toEqual(['campaign-1', 'campaign-2']);
    });

    it('returns an empty list when unset', () => {
      expect(parseCampaignIds(undefined)).toEqual([]);
    });
  });

  describe('validationError', () => {
    it('joins issues into one message', () => {
      const error = validationError('TestHandler', ['a: Required', 'b: Required']);

      expect(error.name).toBe('ValidationError');
      expect(error.message).toBe('[TestHandler] Invalid event detail: a: Required; b: Required');
    });
  });
});
