import { ColumnPresetName } from '@/lib/types/call-log';
import { AssistantEnvKey, SyncConfig } from '@/lib/config/env-validation';
import { COLUMN_PRESETS } from '@/lib/config/column-presets';
import { ConfigurationError, UsageError } from '@/lib/errors';

export const DESTINATION_NAMES = ['outbound', 'inbound', 'partner-outbound', 'partner-inbound'] as const;

export type DestinationName = (typeof DESTINATION_NAMES)[number];

export interface DestinationConfig {
  name: DestinationName;
  assistantId: string;
  sheetName: string;
  range: string;
  preset: ColumnPresetName;
  minDurationSeconds: number | null;
}

interface DestinationRoute {
  assistantKey: AssistantEnvKey;
  sheetName: string;
  preset: ColumnPresetName;
}

// Primary account gets the full cost report; the partner account only needs calls that connected.
export const DESTINATION_ROUTES: Record<DestinationName, DestinationRoute> = {
  'outbound': { assistantKey: 'ASSISTANT_ID', sheetName: 'Outbound', preset: 'full' },
  'inbound': { assistantKey: 'INBOUND_ASSISTANT_ID', sheetName: 'Inbound', preset: 'full' },
  'partner-outbound': { assistantKey: 'PARTNER_ASSISTANT_ID', sheetName: 'PartnerOutbound', preset: 'reduced' },
  'partner-inbound': { assistantKey: 'PARTNER_INBOUND_ASSISTANT_ID', sheetName: 'PartnerInbound', preset: 'reduced' },
};

export function isDestinationName(value: string): value is DestinationName {
  return DESTINATION_NAMES.some(name => name === value);
}

export function parseDestinationName(value: string): DestinationName {
  if (!isDestinationName(value)) {
    throw new UsageError(`Invalid sheet name: ${value}. Expected one of: ${DESTINATION_NAMES.join(', ')}`);
  }
  return value;
}

export function buildDestinationConfig(name: DestinationName, config: SyncConfig): DestinationConfig {
  const route = DESTINATION_ROUTES[name];
  const assistantId = config.assistants[route.assistantKey];
  if (!assistantId) {
    throw new ConfigurationError(
      `Destination '${name}' needs ${route.assistantKey} to be set`,
      [route.assistantKey]
    );
  }

  return {
    name,
    assistantId,
    sheetName: route.sheetName,
    range: `${route.sheetName}!A1:Z`,
    preset: route.preset,
    minDurationSeconds: COLUMN_PRESETS[route.preset].defaultMinDurationSeconds,
  };
}
