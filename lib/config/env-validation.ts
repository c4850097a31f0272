import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { DEFAULT_TIMEZONE, isValidTimeZone } from '@/lib/utils/time';

const requiredString = (name: string, purpose: string) =>
  z.string({
    required_error: `${name} is required for ${purpose}`,
    invalid_type_error: `${name} must be a string`,
  }).min(1, `${name} cannot be empty`);

const optionalString = z
  .string()
  .optional()
  .transform(value => (value ? value : undefined));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

// Define the environment variable schema
const envSchema = z.object({
  // Call-log API
  VAPI_URL: z.string().url('VAPI_URL must be a valid URL').default('https://api.vapi.ai/call'),
  BEARER_TOKEN: requiredString('BEARER_TOKEN', 'fetching call logs'),
  VAPI_PAGE_SIZE: positiveInt(100).pipe(z.number().max(100, 'VAPI_PAGE_SIZE cannot exceed 100')),
  VAPI_MAX_PAGES: positiveInt(1000),

  // Google Sheets
  SPREADSHEET_ID: requiredString('SPREADSHEET_ID', 'writing to Google Sheets'),
  SERVICE_ACCOUNT_FILE: requiredString('SERVICE_ACCOUNT_FILE', 'writing to Google Sheets'),

  // One assistant per destination; only the selected destinations need theirs
  ASSISTANT_ID: optionalString,
  INBOUND_ASSISTANT_ID: optionalString,
  PARTNER_ASSISTANT_ID: optionalString,
  PARTNER_INBOUND_ASSISTANT_ID: optionalString,

  REPORT_TIMEZONE: z
    .string()
    .default(DEFAULT_TIMEZONE)
    .refine(isValidTimeZone, value => ({ message: `REPORT_TIMEZONE '${value}' is not a known timezone` })),
});

export type EnvConfig = z.infer<typeof envSchema>;

export const ASSISTANT_ENV_KEYS = [
  'ASSISTANT_ID',
  'INBOUND_ASSISTANT_ID',
  'PARTNER_ASSISTANT_ID',
  'PARTNER_INBOUND_ASSISTANT_ID',
] as const;

export type AssistantEnvKey = (typeof ASSISTANT_ENV_KEYS)[number];

export interface SyncConfig {
  vapi: {
    url: string;
    bearerToken: string;
    pageSize: number;
    maxPages: number;
  };
  sheets: {
    spreadsheetId: string;
    serviceAccountFile: string;
  };
  assistants: Record<AssistantEnvKey, string | undefined>;
  timeZone: string;
}

export function toSyncConfig(env: EnvConfig): SyncConfig {
  return {
    vapi: {
      url: env.VAPI_URL,
      bearerToken: env.BEARER_TOKEN,
      pageSize: env.VAPI_PAGE_SIZE,
      maxPages: env.VAPI_MAX_PAGES,
    },
    sheets: {
      spreadsheetId: env.SPREADSHEET_ID,
      serviceAccountFile: env.SERVICE_ACCOUNT_FILE,
    },
    assistants: {
      ASSISTANT_ID: env.ASSISTANT_ID,
      INBOUND_ASSISTANT_ID: env.INBOUND_ASSISTANT_ID,
      PARTNER_ASSISTANT_ID: env.PARTNER_ASSISTANT_ID,
      PARTNER_INBOUND_ASSISTANT_ID: env.PARTNER_INBOUND_ASSISTANT_ID,
    },
    timeZone: env.REPORT_TIMEZONE,
  };
}

// Validation functions
export function loadSyncConfig(source: NodeJS.ProcessEnv = process.env): SyncConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.errors.map(err => ({
      variable: err.path.join('.'),
      message: err.message,
    }));
    throw new ConfigurationError(
      `Environment validation failed: ${issues.map(({ variable, message }) => `${variable}: ${message}`).join(', ')}`,
      issues.map(issue => issue.variable)
    );
  }
  return toSyncConfig(result.data);
}

// Check which assistants are configured
export function getConfiguredAssistants(source: NodeJS.ProcessEnv = process.env): Record<AssistantEnvKey, boolean> {
  return {
    ASSISTANT_ID: !!source.ASSISTANT_ID,
    INBOUND_ASSISTANT_ID: !!source.INBOUND_ASSISTANT_ID,
    PARTNER_ASSISTANT_ID: !!source.PARTNER_ASSISTANT_ID,
    PARTNER_INBOUND_ASSISTANT_ID: !!source.PARTNER_INBOUND_ASSISTANT_ID,
  };
}

// Validation with custom error formatting for API responses
export function validateEnvForAPI(source: NodeJS.ProcessEnv = process.env) {
  try {
    return { success: true as const, data: loadSyncConfig(source) };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { success: false as const, error: error.message, variables: error.variables };
    }
    throw error;
  }
}
