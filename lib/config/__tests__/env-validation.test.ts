import { getConfiguredAssistants, loadSyncConfig, validateEnvForAPI } from '../env-validation';
import { ConfigurationError } from '@/lib/errors';

describe('env validation', () => {
  const baseEnv = {
    BEARER_TOKEN: 'test-token',
    SPREADSHEET_ID: 'test-spreadsheet',
    SERVICE_ACCOUNT_FILE: './test-service-account.json',
    ASSISTANT_ID: 'asst-outbound',
  };

  describe('loadSyncConfig', () => {
    it('should build the config object with defaults', () => {
      expect(loadSyncConfig(baseEnv)).toEqual({
        vapi: {
          url: 'https://api.vapi.ai/call',
          bearerToken: 'test-token',
          pageSize: 100,
          maxPages: 1000,
        },
        sheets: {
          spreadsheetId: 'test-spreadsheet',
          serviceAccountFile: './test-service-account.json',
        },
        assistants: {
          ASSISTANT_ID: 'asst-outbound',
          INBOUND_ASSISTANT_ID: undefined,
          PARTNER_ASSISTANT_ID: undefined,
          PARTNER_INBOUND_ASSISTANT_ID: undefined,
        },
        timeZone: 'Australia/Sydney',
      });
    });

    it('should read overrides and coerce numbers', () => {
      const config = loadSyncConfig({
        ...baseEnv,
        VAPI_URL: 'https://vapi.internal.test/call',
        VAPI_PAGE_SIZE: '50',
        VAPI_MAX_PAGES: '5',
        REPORT_TIMEZONE: 'Australia/Perth',
        PARTNER_INBOUND_ASSISTANT_ID: 'asst-partner-inbound',
      });

      expect(config.vapi).toEqual({
        url: 'https://vapi.internal.test/call',
        bearerToken: 'test-token',
        pageSize: 50,
        maxPages: 5,
      });
      expect(config.timeZone).toBe('Australia/Perth');
      expect(config.assistants.PARTNER_INBOUND_ASSISTANT_ID).toBe('asst-partner-inbound');
    });

    it('should treat empty assistant ids as not configured', () => {
      expect(loadSyncConfig({ ...baseEnv, INBOUND_ASSISTANT_ID: '' }).assistants.INBOUND_ASSISTANT_ID).toBeUndefined();
    });

    it('should name every missing required variable', () => {
      const error = (() => {
        try {
          loadSyncConfig({ ASSISTANT_ID: 'asst-outbound' });
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        variables: ['BEARER_TOKEN', 'SPREADSHEET_ID', 'SERVICE_ACCOUNT_FILE'],
      });
      expect(error).toHaveProperty(
        'message',
        expect.stringContaining('BEARER_TOKEN: BEARER_TOKEN is required for fetching call logs')
      );
    });

    it('should reject a page size above the API maximum', () => {
      expect(() => loadSyncConfig({ ...baseEnv, VAPI_PAGE_SIZE: '250' })).toThrow(
        'VAPI_PAGE_SIZE: VAPI_PAGE_SIZE cannot exceed 100'
      );
    });

    it('should reject an unknown timezone', () => {
      expect(() => loadSyncConfig({ ...baseEnv, REPORT_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(
        "REPORT_TIMEZONE 'Mars/Olympus_Mons' is not a known timezone"
      );
    });

    it('should reject a malformed API URL', () => {
      expect(() => loadSyncConfig({ ...baseEnv, VAPI_URL: 'api.vapi.ai' })).toThrow(
        'VAPI_URL: VAPI_URL must be a valid URL'
      );
    });
  });

  describe('getConfiguredAssistants', () => {
    it('should report which assistants are set', () => {
      expect(getConfiguredAssistants({ ...baseEnv, PARTNER_ASSISTANT_ID: 'asst-partner' })).toEqual({
        ASSISTANT_ID: true,
        INBOUND_ASSISTANT_ID: false,
        PARTNER_ASSISTANT_ID: true,
        PARTNER_INBOUND_ASSISTANT_ID: false,
      });
    });
  });

  describe('validateEnvForAPI', () => {
    it('should return the config on success', () => {
      const result = validateEnvForAPI(baseEnv);
      expect(result.success).toBe(true);
    });

    it('should return the failing variables instead of throwing', () => {
      const result = validateEnvForAPI({});
      expect(result).toMatchObject({
        success: false,
        variables: ['BEARER_TOKEN', 'SPREADSHEET_ID', 'SERVICE_ACCOUNT_FILE'],
      });
    });
  });
});
