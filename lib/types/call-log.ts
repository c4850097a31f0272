import { z } from 'zod';

// A sub-record that is not an object reads as absent instead of failing the page.
const subRecord = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape).passthrough().nullish().catch(null);

export const costBreakdownSchema = subRecord({
  total: z.unknown(),
  stt: z.unknown(),
  llm: z.unknown(),
  tts: z.unknown(),
  vapi: z.unknown(),
  analysisCostBreakdown: subRecord({
    summary: z.unknown(),
    structuredData: z.unknown(),
    successEvaluation: z.unknown(),
  }),
});

// Only the fields pagination and row identity depend on are typed; everything else
// is read as-is and turned into a cell by the column selectors.
export const vapiCallSchema = z
  .object({
    id: z.string().nullish(),
    createdAt: z.string().nullish(),
    startedAt: z.string().nullish(),
    endedAt: z.string().nullish(),
    customer: subRecord({
      number: z.unknown(),
    }),
    analysis: subRecord({
      summary: z.unknown(),
      successEvaluation: z.unknown(),
    }),
    costBreakdown: costBreakdownSchema,
    transcript: z.unknown(),
    endedReason: z.unknown(),
    recordingUrl: z.unknown(),
  })
  .passthrough();

export const callLogPageSchema = z.array(vapiCallSchema);

export type VapiCall = z.infer<typeof vapiCallSchema>;

export type CellValue = string | number | boolean;

export type SheetRow = CellValue[];

export const NOT_AVAILABLE = 'N/A';

/**
 * A call whose required fields are present; what a column selector reads from.
 */
export interface CallContext {
  id: string;
  startedAt: string;
  endedAt: string;
  durationSeconds: number;
  timeZone: string;
  call: VapiCall;
}

export interface ColumnSpec {
  header: string;
  select: (context: CallContext) => CellValue;
}

export type ColumnPresetName = 'full' | 'reduced';

export interface ColumnPreset {
  name: ColumnPresetName;
  columns: ColumnSpec[];
  defaultMinDurationSeconds: number | null;
}

export interface ExtractOptions {
  timeZone: string;
  minDurationSeconds: number | null;
}
