import { z, ZodError } from 'zod';
import { ConfigurationError } from '../errors.js';

const nonNegative = z.number().finite().nonnegative();

export const SplittingConfigSchema = z.object({
  minGroupSize: z.number().int().min(2).default(3),
  /** Rupees. Works at or above this amount must go to e-tender. */
  tenderThreshold: z.number().finite().positive().default(1_000_000),
  nameSimilarityThreshold: z.number().min(0).max(1).default(0.6),
  timeWindowDays: nonNegative.default(180),
  maxChainageGapKm: nonNegative.default(5),
});

export const AnalysisConfigSchema = z
  .object({
    amountUnit: z.enum(['LAKH', 'RUPEE']).default('LAKH'),
    excessThresholdPercent: nonNegative.default(10),
    excessHighSeverityPercent: nonNegative.default(25),
    /** Rupees. */
    unspentBalanceThreshold: nonNegative.default(100_000),
    centageRate: z.number().min(0).max(1).default(0.05),
    /** Ledger units; absorbs rounding in recorded centage. */
    centageTolerance: nonNegative.default(0.01),
    delayEscalationMultiplier: z.number().finite().min(1).default(2),
    surveyFollowUpDays: nonNegative.default(365),
    defaultDlpDays: nonNegative.default(1095),
    splitting: SplittingConfigSchema.default({}),
  })
  .refine((c) => c.excessHighSeverityPercent >= c.excessThresholdPercent, {
    message: 'excessHighSeverityPercent must not be below excessThresholdPercent',
    path: ['excessHighSeverityPercent'],
  });

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type SplittingConfig = Readonly<z.output<typeof SplittingConfigSchema>>;
export type AnalysisConfig = Readonly<
  Omit<z.output<typeof AnalysisConfigSchema>, 'splitting'> & { splitting: SplittingConfig }
>;

const RUPEES_PER_UNIT: Record<AnalysisConfig['amountUnit'], number> = {
  LAKH: 100_000,
  RUPEE: 1,
};

/** Converts a rupee-denominated threshold into the unit the ledger is kept in. */
export function toLedgerAmount(rupees: number, config: AnalysisConfig): number {
  return rupees / RUPEES_PER_UNIT[config.amountUnit];
}

/**
 * Validate threshold overrides on top of the defaults and return a frozen
 * config. Throws ConfigurationError on any invalid value.
 */
export function resolveAnalysisConfig(input: AnalysisConfigInput | Record<string, unknown> = {}): AnalysisConfig {
  try {
    const parsed = AnalysisConfigSchema.parse(input);
    return Object.freeze({
      ...parsed,
      splitting: Object.freeze({ ...parsed.splitting }),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ConfigurationError(
        `Invalid analysis configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
        issues
      );
    }
    throw error;
  }
}

const ENV_KEYS = {
  excessThresholdPercent: 'ANALYSIS_EXCESS_THRESHOLD_PERCENT',
  excessHighSeverityPercent: 'ANALYSIS_EXCESS_HIGH_PERCENT',
  unspentBalanceThreshold: 'ANALYSIS_UNSPENT_BALANCE_THRESHOLD',
  centageRate: 'ANALYSIS_CENTAGE_RATE',
  centageTolerance: 'ANALYSIS_CENTAGE_TOLERANCE',
  delayEscalationMultiplier: 'ANALYSIS_DELAY_ESCALATION_MULTIPLIER',
  surveyFollowUpDays: 'ANALYSIS_SURVEY_FOLLOW_UP_DAYS',
  defaultDlpDays: 'ANALYSIS_DEFAULT_DLP_DAYS',
} as const;

const SPLITTING_ENV_KEYS = {
  minGroupSize: 'ANALYSIS_SPLIT_MIN_GROUP_SIZE',
  tenderThreshold: 'ANALYSIS_SPLIT_TENDER_THRESHOLD',
  nameSimilarityThreshold: 'ANALYSIS_SPLIT_NAME_SIMILARITY',
  timeWindowDays: 'ANALYSIS_SPLIT_TIME_WINDOW_DAYS',
  maxChainageGapKm: 'ANALYSIS_SPLIT_MAX_CHAINAGE_GAP_KM',
} as const;

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be numeric, got '${raw}'`, [
      { path: name, message: 'Expected a number' },
    ]);
  }
  return value;
}

/**
 * Read threshold overrides from the environment. Unset variables fall back to
 * defaults; anything set but invalid is fatal.
 */
export function loadAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const input: Record<string, unknown> = {};
  const splitting: Record<string, unknown> = {};

  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = readNumber(env, name);
    if (value !== undefined) input[key] = value;
  }
  for (const [key, name] of Object.entries(SPLITTING_ENV_KEYS)) {
    const value = readNumber(env, name);
    if (value !== undefined) splitting[key] = value;
  }

  const unit = env.ANALYSIS_AMOUNT_UNIT?.trim();
  if (unit) input.amountUnit = unit.toUpperCase();
  input.splitting = splitting;

  return resolveAnalysisConfig(input);
}
