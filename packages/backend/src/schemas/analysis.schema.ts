import { z } from 'zod';
import { parseLedgerDate } from '../engine/records/dates.js';

const rowSchema = z.record(z.string(), z.unknown());

const asOfSchema = z.preprocess(
  (value) => {
    if (value === undefined || value === null || value === '') return undefined;
    if (value instanceof Date || typeof value === 'string' || typeof value === 'number') {
      return parseLedgerDate(value);
    }
    return value;
  },
  z.date({ invalid_type_error: 'asOf must be a date' }).optional()
);

/** Partial threshold overrides; validated in full once merged onto the base config. */
export const configOverridesSchema = z
  .object({
    amountUnit: z.enum(['LAKH', 'RUPEE']).optional(),
    excessThresholdPercent: z.number().optional(),
    excessHighSeverityPercent: z.number().optional(),
    unspentBalanceThreshold: z.number().optional(),
    centageRate: z.number().optional(),
    centageTolerance: z.number().optional(),
    delayEscalationMultiplier: z.number().optional(),
    surveyFollowUpDays: z.number().optional(),
    defaultDlpDays: z.number().optional(),
    splitting: z
      .object({
        minGroupSize: z.number().optional(),
        tenderThreshold: z.number().optional(),
        nameSimilarityThreshold: z.number().optional(),
        timeWindowDays: z.number().optional(),
        maxChainageGapKm: z.number().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

// Malformed records are excluded with a note during the run, not rejected here.
export const analyzeRecordsSchema = z.object({
  records: z.array(z.unknown()),
  asOf: asOfSchema,
  config: configOverridesSchema.optional(),
});

export type AnalyzeRecordsInput = z.infer<typeof analyzeRecordsSchema>;

export const analyzeSheetSchema = z.object({
  rows: z.array(rowSchema),
  asOf: asOfSchema,
  config: configOverridesSchema.optional(),
});

export type AnalyzeSheetInput = z.infer<typeof analyzeSheetSchema>;
