import {
  CallContext,
  ColumnPreset,
  ExtractOptions,
  SheetRow,
  VapiCall,
} from '@/lib/types/call-log';
import { DEFAULT_MIN_DURATION_SECONDS } from '@/lib/config/column-presets';
import { ParseError } from '@/lib/errors';
import { calculateDurationSeconds } from '@/lib/utils/time';

type TimedCall = Omit<CallContext, 'timeZone'>;

/**
 * Reads the required fields of a call and computes its duration.
 * Returns null for calls missing an id or either timestamp, and for calls
 * whose timestamps do not parse (logged with the call id).
 */
function resolveTimedCall(call: VapiCall): TimedCall | null {
  const { id, startedAt, endedAt } = call;
  if (!id || !startedAt || !endedAt) {
    return null;
  }

  try {
    return { id, startedAt, endedAt, durationSeconds: calculateDurationSeconds(startedAt, endedAt), call };
  } catch (error) {
    if (error instanceof ParseError) {
      console.error(`Error calculating duration for call ${id}: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export function exceedsMinDuration(durationSeconds: number, minDurationSeconds: number | null): boolean {
  return minDurationSeconds === null || durationSeconds > minDurationSeconds;
}

export function extractCallRow(call: VapiCall, preset: ColumnPreset, options: ExtractOptions): SheetRow | null {
  const timed = resolveTimedCall(call);
  if (!timed || !exceedsMinDuration(timed.durationSeconds, options.minDurationSeconds)) {
    return null;
  }

  const context: CallContext = { ...timed, timeZone: options.timeZone };
  return preset.columns.map(column => column.select(context));
}

export function extractCallRows(calls: VapiCall[], preset: ColumnPreset, options: ExtractOptions): SheetRow[] {
  const rows: SheetRow[] = [];
  for (const call of calls) {
    const row = extractCallRow(call, preset, options);
    if (row) {
      rows.push(row);
    }
  }
  return rows;
}

/**
 * Keep calls lasting strictly longer than the threshold, in their original order.
 */
export function filterByMinDuration(
  calls: VapiCall[],
  minDurationSeconds: number = DEFAULT_MIN_DURATION_SECONDS
): VapiCall[] {
  return calls.filter(call => {
    const timed = resolveTimedCall(call);
    return timed !== null && exceedsMinDuration(timed.durationSeconds, minDurationSeconds);
  });
}
