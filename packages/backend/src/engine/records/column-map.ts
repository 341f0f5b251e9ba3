import { WORK_RECORD_FIELDS, type WorkRecordField } from '../../schemas/work-record.schema.js';

/**
 * Header text seen in works ledgers, per canonical field. Matching ignores
 * case, spacing, punctuation and a trailing unit such as "(Lakh)" or "(Days)".
 * Canonical field names are always accepted as headers too.
 */
const COLUMN_ALIASES: Record<WorkRecordField, readonly string[]> = {
  serialNo: ['Sr.', 'Sr. No.', 'Serial No', 'S. No.'],
  budgetItemNo: ['Budget Item No.', 'Budget Item Number'],
  workName: ['Name of the work', 'Name of Work', 'Work Name'],
  workNameLocal: ['Name Of The Work (In Marathi)', 'Name Of The Work (In Hindi)', 'Name of Work (Local)'],
  headOfAccount: ['Head of Accounts', 'Head of Account', 'Budget Head'],
  expenditureHead: ['Expenditure Head', 'Head Debited', 'Expenditure Booked Under'],
  aaCost: ['Administrative Approval Cost (Lakh)', 'AA Cost', 'A.A. Cost'],
  contractCost: ['Contract Agreement Cost (Lakh)', 'Contract Cost', 'Agreement Cost'],
  totalExpenditure: ['Total Expenditure (Lakhs)', 'Total Expenditure'],
  centageRecovered: ['Centage Recovered', 'Centage Charges Recovered'],
  unspentBalance: ['Unspent Balance'],
  refundRecorded: ['Refund Recorded', 'Unspent Balance Refunded', 'Refund Made'],
  aaDate: ['Administrative Approval Date', 'AA Date'],
  workOrderDate: ['Date of Work_Order', 'Work Order Date'],
  originalTimeLimitDays: ['Original Time Limit in Days', 'Time Limit (Days)'],
  physicalCompletionDate: ['Physical Completion Date', 'Date of Completion'],
  dlpDays: ['DLP (Days)', 'Defect Liability Period (Days)'],
  physicalProgressPercent: ['Physical Progress', 'Physical Progress (%)'],
  roadCategory: ['Road Category'],
  roadNumber: ['Road Number', 'Road No.'],
  chainageFrom: ['Chainage From'],
  chainageTo: ['Chainage To'],
  isDepositWork: ['Deposit Work', 'Is Deposit Work'],
  workType: ['Work Category', 'Work Type', 'Type of Work'],
};

export const REQUIRED_COLUMNS: readonly WorkRecordField[] = [
  'serialNo',
  'budgetItemNo',
  'workName',
  'totalExpenditure',
];

export function normalizeHeader(header: string): string {
  return header
    .toLowerCase()
    .replace(/\((?:in\s*)?(?:rs\.?|lakhs?|%|days?)\)/g, '')
    .replace(/[^\p{L}\p{N}]/gu, '');
}

function buildAliasIndex(): ReadonlyMap<string, WorkRecordField> {
  const index = new Map<string, WorkRecordField>();
  for (const field of WORK_RECORD_FIELDS) {
    for (const alias of [field, ...COLUMN_ALIASES[field]]) {
      const key = normalizeHeader(alias);
      const existing = index.get(key);
      if (existing && existing !== field) {
        throw new Error(`Column alias '${alias}' maps to both ${existing} and ${field}`);
      }
      index.set(key, field);
    }
  }
  return index;
}

const ALIAS_INDEX = buildAliasIndex();

export function resolveColumn(header: string): WorkRecordField | null {
  return ALIAS_INDEX.get(normalizeHeader(header)) ?? null;
}

export interface ColumnResolution {
  readonly mapping: ReadonlyMap<string, WorkRecordField>;
  readonly unknownColumns: readonly string[];
  readonly missingColumns: readonly WorkRecordField[];
}

/** Resolves the headers of a sheet once, before any row is mapped. */
export function resolveColumns(headers: Iterable<string>): ColumnResolution {
  const mapping = new Map<string, WorkRecordField>();
  const unknownColumns: string[] = [];

  for (const header of headers) {
    if (mapping.has(header) || unknownColumns.includes(header)) continue;
    const field = resolveColumn(header);
    if (field) {
      mapping.set(header, field);
    } else {
      unknownColumns.push(header);
    }
  }

  const present = new Set(mapping.values());
  const missingColumns = REQUIRED_COLUMNS.filter((field) => !present.has(field));

  return { mapping, unknownColumns, missingColumns };
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export interface MappedSheet {
  readonly rows: ReadonlyArray<Partial<Record<WorkRecordField, unknown>>>;
  readonly unknownColumns: readonly string[];
  readonly missingColumns: readonly WorkRecordField[];
}

/**
 * Re-key header-keyed sheet rows onto canonical field names. When two headers
 * resolve to the same field the first non-blank cell wins.
 */
export function mapSheetRows(rows: ReadonlyArray<Record<string, unknown>>): MappedSheet {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const header of Object.keys(row)) headers.add(header);
  }
  const { mapping, unknownColumns, missingColumns } = resolveColumns(headers);

  const mapped = rows.map((row) => {
    const out: Partial<Record<WorkRecordField, unknown>> = {};
    for (const [header, value] of Object.entries(row)) {
      const field = mapping.get(header);
      if (!field) continue;
      if (isBlank(out[field])) out[field] = value;
    }
    return out;
  });

  return { rows: mapped, unknownColumns, missingColumns };
}
