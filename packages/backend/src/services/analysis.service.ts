import { AnalysisOrchestrator } from '../engine/analysis/analysis-orchestrator.js';
import type { AnalysisResult } from '../engine/analysis/types.js';
import { mapSheetRows } from '../engine/records/column-map.js';
import type { DataQualityNote } from '../engine/records/types.js';
import { type AnalysisConfig, resolveAnalysisConfig } from '../lib/config/analysis.js';
import { ConfigurationError, ValidationError } from '../lib/errors.js';
import { logger as defaultLogger, type AnalysisLogger } from '../lib/logger.js';
import type {
  AnalyzeRecordsInput,
  AnalyzeSheetInput,
  ConfigOverrides,
} from '../schemas/analysis.schema.js';

export interface SheetAnalysisResult extends AnalysisResult {
  readonly unknownColumns: readonly string[];
}

export class AnalysisService {
  constructor(private readonly baseConfig: AnalysisConfig) {}

  getConfig(): AnalysisConfig {
    return this.baseConfig;
  }

  /**
   * Layer request overrides on the server's config. Invalid overrides are the
   * caller's fault, so they surface as a ValidationError.
   */
  resolveConfig(overrides?: ConfigOverrides): AnalysisConfig {
    if (!overrides) return this.baseConfig;

    try {
      return resolveAnalysisConfig({
        ...this.baseConfig,
        ...overrides,
        splitting: { ...this.baseConfig.splitting, ...overrides.splitting },
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ValidationError(error.message, { issues: error.issues });
      }
      throw error;
    }
  }

  analyzeRecords(input: AnalyzeRecordsInput, log: AnalysisLogger = defaultLogger): AnalysisResult {
    const config = this.resolveConfig(input.config);
    const orchestrator = new AnalysisOrchestrator(config, { logger: log });
    return orchestrator.run(input.records, { asOf: input.asOf });
  }

  /**
   * Analyze header-keyed spreadsheet rows. Headers are matched against the
   * known column aliases; unmatched headers are reported and ignored.
   */
  analyzeSheet(input: AnalyzeSheetInput, log: AnalysisLogger = defaultLogger): SheetAnalysisResult {
    const config = this.resolveConfig(input.config);
    const sheet = mapSheetRows(input.rows);

    if (input.rows.length > 0 && sheet.missingColumns.length > 0) {
      throw new ValidationError(`Sheet is missing required columns: ${sheet.missingColumns.join(', ')}`, {
        missingColumns: sheet.missingColumns,
      });
    }

    const columnNotes: DataQualityNote[] = sheet.unknownColumns.map((header) => ({
      kind: 'UNKNOWN_COLUMN',
      rowNumber: null,
      recordId: null,
      flagId: null,
      message: `Column '${header}' is not recognised and was ignored`,
      fields: [header],
    }));
    if (columnNotes.length > 0) {
      log.debug({ unknownColumns: sheet.unknownColumns }, 'Ignoring unrecognised columns');
    }

    const orchestrator = new AnalysisOrchestrator(config, { logger: log });
    const result = orchestrator.run(sheet.rows, { asOf: input.asOf, upstreamNotes: columnNotes });

    return Object.freeze({ ...result, unknownColumns: sheet.unknownColumns });
  }
}
