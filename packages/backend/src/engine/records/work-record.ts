import { WorkRecordSchema, type ParsedWorkRecord } from '../../schemas/work-record.schema.js';
import { addDays, diffDays } from './dates.js';
import type {
  DataQualityNote,
  RecordParseResult,
  RecordRef,
  RoadCategory,
  WorkRecord,
} from './types.js';

const ROAD_NUMBER_PATTERN = /\b(SH|MDR|NH)\s*-?\s*(\d+)/i;

/** Pulls a road number such as `SH12` out of free text like "Improvement to S.H.-12". */
export function extractRoadNumber(text: string): string | null {
  const match = ROAD_NUMBER_PATTERN.exec(text.replace(/\./g, ''));
  if (!match) return null;
  return `${match[1].toUpperCase()}${Number(match[2])}`;
}

function roadCategoryOf(roadNumber: string | null): RoadCategory | null {
  if (!roadNumber) return null;
  const prefix = /^[A-Z]+/.exec(roadNumber)?.[0];
  return prefix === 'SH' || prefix === 'MDR' || prefix === 'NH' ? prefix : null;
}

function buildRecord(parsed: ParsedWorkRecord, rowNumber: number): WorkRecord {
  const roadNumber = parsed.roadNumber
    ? (extractRoadNumber(parsed.roadNumber) ?? parsed.roadNumber.toUpperCase().replace(/[\s-]/g, ''))
    : extractRoadNumber(parsed.workName);

  return Object.freeze({
    id: parsed.serialNo,
    rowNumber,
    serialNo: parsed.serialNo,
    budgetItemNo: parsed.budgetItemNo,
    workName: parsed.workName,
    workNameLocal: parsed.workNameLocal ?? null,
    headOfAccount: parsed.headOfAccount ?? null,
    expenditureHead: parsed.expenditureHead ?? null,
    aaCost: parsed.aaCost ?? null,
    contractCost: parsed.contractCost ?? null,
    totalExpenditure: parsed.totalExpenditure,
    centageRecovered: parsed.centageRecovered ?? null,
    unspentBalance: parsed.unspentBalance ?? null,
    refundRecorded: parsed.refundRecorded,
    aaDate: parsed.aaDate ?? null,
    workOrderDate: parsed.workOrderDate ?? null,
    originalTimeLimitDays: parsed.originalTimeLimitDays ?? null,
    physicalCompletionDate: parsed.physicalCompletionDate ?? null,
    dlpDays: parsed.dlpDays ?? null,
    physicalProgressPercent: parsed.physicalProgressPercent ?? null,
    roadCategory: parsed.roadCategory ?? roadCategoryOf(roadNumber),
    roadNumber,
    chainageFrom: parsed.chainageFrom ?? null,
    chainageTo: parsed.chainageTo ?? null,
    isDepositWork: parsed.isDepositWork,
    workType: parsed.workType,
  });
}

/**
 * Validate one input row. Never throws for bad data: structural problems
 * come back as an EXCLUDED_RECORD note.
 */
export function parseWorkRecord(raw: unknown, rowNumber: number): RecordParseResult {
  const result = WorkRecordSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, record: buildRecord(result.data, rowNumber) };
  }

  const fields = [...new Set(result.error.issues.map((issue) => issue.path.join('.') || '(row)'))];
  const problems = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  const serialNo = serialOf(raw);

  const note: DataQualityNote = {
    kind: 'EXCLUDED_RECORD',
    rowNumber,
    recordId: serialNo,
    flagId: null,
    message: `Row ${rowNumber} excluded from analysis: ${problems.join('; ')}`,
    fields,
  };
  return { ok: false, note };
}

function serialOf(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || !('serialNo' in raw)) return null;
  const value = raw.serialNo;
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function toRecordRef(record: WorkRecord): RecordRef {
  return Object.freeze({
    id: record.id,
    rowNumber: record.rowNumber,
    serialNo: record.serialNo,
    budgetItemNo: record.budgetItemNo,
    workName: record.workName,
  });
}

// Derived accessors

/** Percentage by which expenditure exceeds the AA cost; null when AA cost is absent or zero. */
export function excessPercent(record: WorkRecord): number | null {
  if (record.aaCost === null || record.aaCost === 0) return null;
  return ((record.totalExpenditure - record.aaCost) * 100) / record.aaCost;
}

export function isComplete(record: WorkRecord): boolean {
  return record.physicalProgressPercent !== null && record.physicalProgressPercent >= 100;
}

/** Days from work order to completion (or `asOf` while the work is open). */
export function elapsedDays(record: WorkRecord, asOf: Date): number | null {
  if (!record.workOrderDate) return null;
  return diffDays(record.workOrderDate, record.physicalCompletionDate ?? asOf);
}

/** Stipulated completion date. */
export function dueDate(record: WorkRecord): Date | null {
  if (!record.workOrderDate || record.originalTimeLimitDays === null) return null;
  return addDays(record.workOrderDate, record.originalTimeLimitDays);
}

export interface DateWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Period during which the work or its defect liability is live: from work
 * order to the end of the DLP after completion. Falls back to the due date,
 * then `asOf`, when the work has no completion date.
 */
export function activeWindow(
  record: WorkRecord,
  defaultDlpDays: number,
  asOf: Date
): DateWindow | null {
  if (!record.workOrderDate) return null;
  const completion = record.physicalCompletionDate ?? dueDate(record) ?? asOf;
  const end = addDays(completion, record.dlpDays ?? defaultDlpDays);
  return { start: record.workOrderDate, end };
}

/** Date the work was issued: work order date, else AA date. */
export function issueDate(record: WorkRecord): Date | null {
  return record.workOrderDate ?? record.aaDate;
}

/**
 * Batch grouping key: road category plus road number. Works on a category
 * without an identifiable road number share that category's unnumbered bucket.
 */
export function roadGroupKey(record: WorkRecord): string | null {
  if (!record.roadCategory) return null;
  return `${record.roadCategory}:${record.roadNumber ?? ''}`;
}
