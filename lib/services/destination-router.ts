import { SyncConfig } from '@/lib/config/env-validation';
import {
  buildDestinationConfig,
  DESTINATION_NAMES,
  DESTINATION_ROUTES,
  DestinationConfig,
  DestinationName,
  parseDestinationName,
} from '@/lib/config/destinations';
import { COLUMN_PRESETS, headerRow } from '@/lib/config/column-presets';
import { SheetRow } from '@/lib/types/call-log';
import { ConfigurationError } from '@/lib/errors';
import { extractCallRows } from '@/lib/services/call-extractor';
import { CallLogSource, VapiService } from '@/lib/services/vapi';
import { GoogleSheetsService, SheetWriter } from '@/lib/services/google-sheets';

export interface DestinationSyncResult {
  destination: DestinationName;
  range: string;
  fetched: number;
  rows: number;
  updatedCells: number;
}

export class DestinationRouter {
  private callLogs: CallLogSource;
  private sheets: SheetWriter;
  private config: SyncConfig;

  constructor(deps: { callLogs: CallLogSource; sheets: SheetWriter; config: SyncConfig }) {
    this.callLogs = deps.callLogs;
    this.sheets = deps.sheets;
    this.config = deps.config;
  }

  resolve(name: string): DestinationConfig {
    return buildDestinationConfig(parseDestinationName(name), this.config);
  }

  /**
   * Destinations for a run: the named one, or every destination with an assistant
   * configured, in table order. Everything is resolved before the first fetch.
   */
  select(name?: string): DestinationConfig[] {
    if (name !== undefined) {
      return [this.resolve(name)];
    }

    const destinations: DestinationConfig[] = [];
    const missing: string[] = [];
    for (const destination of DESTINATION_NAMES) {
      const { assistantKey } = DESTINATION_ROUTES[destination];
      if (this.config.assistants[assistantKey]) {
        destinations.push(buildDestinationConfig(destination, this.config));
      } else {
        console.warn(`Skipping ${destination}: ${assistantKey} is not set`);
        missing.push(assistantKey);
      }
    }

    if (destinations.length === 0) {
      throw new ConfigurationError(`No destinations configured: set one of ${missing.join(', ')}`, missing);
    }
    return destinations;
  }

  buildValues(destination: DestinationConfig, rows: SheetRow[]): SheetRow[] {
    return [headerRow(COLUMN_PRESETS[destination.preset]), ...rows];
  }

  async syncDestination(destination: DestinationConfig): Promise<DestinationSyncResult> {
    console.log(`Syncing ${destination.name} (${destination.range})`);

    const fetched = await this.callLogs.fetchCallLogs(destination.assistantId);
    const calls = this.callLogs.deduplicateCalls(fetched);
    const rows = extractCallRows(calls, COLUMN_PRESETS[destination.preset], {
      timeZone: this.config.timeZone,
      minDurationSeconds: destination.minDurationSeconds,
    });

    const updatedCells = await this.sheets.writeRange(destination.range, this.buildValues(destination, rows));
    console.log(`${updatedCells} cells updated.`);

    return {
      destination: destination.name,
      range: destination.range,
      fetched: fetched.length,
      rows: rows.length,
      updatedCells,
    };
  }

  async run(name?: string): Promise<DestinationSyncResult[]> {
    const destinations = this.select(name);
    const results: DestinationSyncResult[] = [];

    // One destination at a time: fetch, transform and write before moving on
    for (const destination of destinations) {
      results.push(await this.syncDestination(destination));
    }

    return results;
  }
}

export function createDestinationRouter(config: SyncConfig): DestinationRouter {
  return new DestinationRouter({
    callLogs: new VapiService({
      url: config.vapi.url,
      bearerToken: config.vapi.bearerToken,
      pageSize: config.vapi.pageSize,
      maxPages: config.vapi.maxPages,
    }),
    sheets: new GoogleSheetsService(config.sheets),
    config,
  });
}
