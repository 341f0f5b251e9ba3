import type { AnalysisConfig } from '../../lib/config/analysis.js';
import { logger as defaultLogger, type AnalysisLogger } from '../../lib/logger.js';
import { BatchAnalyzer } from '../batch/batch-analyzer.js';
import { startOfUtcDay, toIsoDate } from '../records/dates.js';
import { parseWorkRecord } from '../records/work-record.js';
import type { DataQualityNote, WorkRecord } from '../records/types.js';
import { RecordEvaluator, buildRuleContext } from '../rules/record-evaluator.js';
import type { Flag } from '../rules/types.js';
import { aggregateFlags, buildSummary } from './flag-aggregator.js';
import type { AnalysisResult } from './types.js';

export interface AnalysisOrchestratorOptions {
  logger?: AnalysisLogger;
  evaluator?: RecordEvaluator;
  batchAnalyzer?: BatchAnalyzer;
}

export interface RunOptions {
  /** Evaluation date for delay, survey and DLP checks. Defaults to today. */
  asOf?: Date;
  /** Notes raised before the rows reached the engine, e.g. by column mapping. */
  upstreamNotes?: readonly DataQualityNote[];
}

/** Header occupies sheet row 1, so data index 0 is row 2. */
const FIRST_DATA_ROW = 2;

/**
 * One complete analysis run: validate rows, apply the record rules to each
 * valid record in input order, run the cross-record analyzers once, then
 * merge and partition. Synchronous and free of I/O.
 */
export class AnalysisOrchestrator {
  private readonly config: AnalysisConfig;
  private readonly log: AnalysisLogger;
  private readonly evaluator: RecordEvaluator;
  private readonly batchAnalyzer: BatchAnalyzer;

  constructor(config: AnalysisConfig, options: AnalysisOrchestratorOptions = {}) {
    this.config = config;
    this.log = options.logger ?? defaultLogger;
    this.evaluator = options.evaluator ?? new RecordEvaluator();
    this.batchAnalyzer = options.batchAnalyzer ?? new BatchAnalyzer();
  }

  run(rows: readonly unknown[], options: RunOptions = {}): AnalysisResult {
    const asOf = startOfUtcDay(options.asOf ?? new Date());
    const notes: DataQualityNote[] = [...(options.upstreamNotes ?? [])];

    this.log.info({ rows: rows.length, asOf: toIsoDate(asOf) }, 'Starting red flag analysis');

    const records = this.validate(rows, notes);

    const context = buildRuleContext(records, this.config, asOf);
    const recordFlags = new Map<string, Flag[]>();
    for (const record of records) {
      const evaluation = this.evaluator.evaluate(record, context);
      if (evaluation.flags.length > 0) recordFlags.set(record.id, evaluation.flags);
      notes.push(...evaluation.notes);
    }

    const batch = this.batchAnalyzer.analyze(records, { config: this.config, asOf });
    notes.push(...batch.notes);

    const partition = aggregateFlags(records, recordFlags, batch.flagsByRecord);
    const summary = buildSummary(rows.length, records.length, partition, notes);

    if (summary.excludedRecords > 0) {
      this.log.warn({ excluded: summary.excludedRecords }, 'Rows excluded from analysis');
    }
    this.log.info(
      {
        redFlagged: summary.redFlaggedCount,
        greenFlagged: summary.greenFlaggedCount,
        flags: summary.totalFlags,
        notes: notes.length,
      },
      'Red flag analysis complete'
    );

    return Object.freeze({
      asOf: toIsoDate(asOf),
      totalRows: rows.length,
      redFlagged: Object.freeze(partition.redFlagged),
      greenFlagged: Object.freeze(partition.greenFlagged),
      summary,
      dataQualityNotes: Object.freeze(notes.map((note) => Object.freeze(note))),
      config: this.config,
    });
  }

  private validate(rows: readonly unknown[], notes: DataQualityNote[]): WorkRecord[] {
    const records: WorkRecord[] = [];
    const seen = new Map<string, number>();

    rows.forEach((row, index) => {
      const rowNumber = index + FIRST_DATA_ROW;
      const parsed = parseWorkRecord(row, rowNumber);
      if (!parsed.ok) {
        notes.push(parsed.note);
        return;
      }

      const firstRow = seen.get(parsed.record.id);
      if (firstRow !== undefined) {
        notes.push({
          kind: 'DUPLICATE_RECORD',
          rowNumber,
          recordId: parsed.record.id,
          flagId: null,
          message: `Row ${rowNumber} excluded: serial number ${parsed.record.id} already used by row ${firstRow}`,
          fields: ['serialNo'],
        });
        return;
      }

      seen.set(parsed.record.id, rowNumber);
      records.push(parsed.record);
    });

    this.log.debug({ valid: records.length, rows: rows.length }, 'Rows validated');
    return records;
  }
}
