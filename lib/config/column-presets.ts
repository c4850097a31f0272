import {
  CallContext,
  CellValue,
  ColumnPreset,
  ColumnPresetName,
  ColumnSpec,
  NOT_AVAILABLE,
} from '@/lib/types/call-log';
import { formatTimestamp } from '@/lib/utils/time';

export const DEFAULT_MIN_DURATION_SECONDS = 20;

/**
 * Scalars pass through; nested values are written as JSON and anything absent as `N/A`.
 */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return NOT_AVAILABLE;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

const costs = (context: CallContext) => context.call.costBreakdown;
const analysisCosts = (context: CallContext) => context.call.costBreakdown?.analysisCostBreakdown;

const identityColumns: ColumnSpec[] = [
  { header: 'ID', select: ({ id }) => id },
  { header: 'Phone Number', select: ({ call }) => toCell(call.customer?.number) },
  { header: 'Duration (s)', select: ({ durationSeconds }) => durationSeconds },
];

const analysisColumns: ColumnSpec[] = [
  { header: 'Summary', select: ({ call }) => toCell(call.analysis?.summary) },
  { header: 'Success Evaluation', select: ({ call }) => toCell(call.analysis?.successEvaluation) },
  { header: 'Transcript', select: ({ call }) => toCell(call.transcript) },
];

const fullColumns: ColumnSpec[] = [
  ...identityColumns,
  { header: 'Start Time', select: ({ startedAt, timeZone }) => formatTimestamp(startedAt, timeZone) },
  { header: 'End Time', select: ({ endedAt, timeZone }) => formatTimestamp(endedAt, timeZone) },
  ...analysisColumns,
  { header: 'Ended Reason', select: ({ call }) => toCell(call.endedReason) },
  { header: 'Recording Url', select: ({ call }) => toCell(call.recordingUrl) },
  { header: 'Total Cost (USD)', select: (context) => toCell(costs(context)?.total) },
  { header: 'STT Cost', select: (context) => toCell(costs(context)?.stt) },
  { header: 'LLM Cost', select: (context) => toCell(costs(context)?.llm) },
  { header: 'TTS Cost', select: (context) => toCell(costs(context)?.tts) },
  { header: 'Vapi Cost', select: (context) => toCell(costs(context)?.vapi) },
  { header: 'Summary Cost', select: (context) => toCell(analysisCosts(context)?.summary) },
  { header: 'Structured Data Cost', select: (context) => toCell(analysisCosts(context)?.structuredData) },
  { header: 'Success Evaluation Cost', select: (context) => toCell(analysisCosts(context)?.successEvaluation) },
];

// Raw timestamps, no costs or URLs
const reducedColumns: ColumnSpec[] = [
  ...identityColumns,
  { header: 'Start Time', select: ({ startedAt }) => startedAt },
  { header: 'End Time', select: ({ endedAt }) => endedAt },
  ...analysisColumns,
];

export const COLUMN_PRESETS: Record<ColumnPresetName, ColumnPreset> = {
  full: {
    name: 'full',
    columns: fullColumns,
    defaultMinDurationSeconds: null,
  },
  reduced: {
    name: 'reduced',
    columns: reducedColumns,
    defaultMinDurationSeconds: DEFAULT_MIN_DURATION_SECONDS,
  },
};

export function headerRow(preset: ColumnPreset): string[] {
  return preset.columns.map(column => column.header);
}
