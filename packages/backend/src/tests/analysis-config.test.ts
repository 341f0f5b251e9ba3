import { describe, it, expect } from 'vitest';
import {
  loadAnalysisConfig,
  resolveAnalysisConfig,
  toLedgerAmount,
} from '../lib/config/analysis.js';
import { ConfigurationError } from '../lib/errors.js';

describe('resolveAnalysisConfig', () => {
  it('fills in defaults', () => {
    const config = resolveAnalysisConfig();

    expect(config.amountUnit).toBe('LAKH');
    expect(config.excessThresholdPercent).toBe(10);
    expect(config.excessHighSeverityPercent).toBe(25);
    expect(config.unspentBalanceThreshold).toBe(100000);
    expect(config.centageRate).toBe(0.05);
    expect(config.defaultDlpDays).toBe(1095);
    expect(config.splitting).toEqual({
      minGroupSize: 3,
      tenderThreshold: 1000000,
      nameSimilarityThreshold: 0.6,
      timeWindowDays: 180,
      maxChainageGapKm: 5,
    });
  });

  it('returns a frozen config', () => {
    const config = resolveAnalysisConfig({ splitting: { minGroupSize: 4 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.splitting)).toBe(true);
    expect(config.splitting.minGroupSize).toBe(4);
    expect(config.splitting.timeWindowDays).toBe(180);
  });

  it('rejects a negative threshold', () => {
    expect(() => resolveAnalysisConfig({ excessThresholdPercent: -1 })).toThrow(ConfigurationError);
  });

  it('rejects a high-severity threshold below the base threshold', () => {
    try {
      resolveAnalysisConfig({ excessThresholdPercent: 30 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toEqual([
        {
          path: 'excessHighSeverityPercent',
          message: 'excessHighSeverityPercent must not be below excessThresholdPercent',
        },
      ]);
    }
  });

  it('rejects a similarity threshold above 1', () => {
    expect(() => resolveAnalysisConfig({ splitting: { nameSimilarityThreshold: 1.5 } })).toThrow(
      ConfigurationError
    );
  });
});

describe('toLedgerAmount', () => {
  it('converts rupees to the ledger unit', () => {
    expect(toLedgerAmount(1000000, resolveAnalysisConfig())).toBe(10);
    expect(toLedgerAmount(1000000, resolveAnalysisConfig({ amountUnit: 'RUPEE' }))).toBe(1000000);
  });
});

describe('loadAnalysisConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadAnalysisConfig({})).toEqual(resolveAnalysisConfig());
  });

  it('reads overrides from the environment', () => {
    const config = loadAnalysisConfig({
      ANALYSIS_AMOUNT_UNIT: 'rupee',
      ANALYSIS_EXCESS_THRESHOLD_PERCENT: '15',
      ANALYSIS_SPLIT_TIME_WINDOW_DAYS: '90',
      ANALYSIS_CENTAGE_RATE: ' ',
    });

    expect(config.amountUnit).toBe('RUPEE');
    expect(config.excessThresholdPercent).toBe(15);
    expect(config.splitting.timeWindowDays).toBe(90);
    expect(config.centageRate).toBe(0.05);
  });

  it('fails on a non-numeric value', () => {
    expect(() => loadAnalysisConfig({ ANALYSIS_SURVEY_FOLLOW_UP_DAYS: 'a year' })).toThrow(
      "ANALYSIS_SURVEY_FOLLOW_UP_DAYS must be numeric, got 'a year'"
    );
  });

  it('fails on an unknown amount unit', () => {
    expect(() => loadAnalysisConfig({ ANALYSIS_AMOUNT_UNIT: 'crore' })).toThrow(ConfigurationError);
  });
});
