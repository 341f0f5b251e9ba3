export type RoadCategory = 'SH' | 'MDR' | 'NH' | 'OTHER';

export type WorkType = 'survey' | 'execution' | 'maintenance' | 'other';

/**
 * One validated ledger row. Amounts are in the ledger's unit (see
 * `AnalysisConfig.amountUnit`); dates are UTC midnight.
 */
export interface WorkRecord {
  /** Stable identity, taken from the serial number. */
  readonly id: string;
  /** Sheet row the record was read from (header is row 1). */
  readonly rowNumber: number;

  readonly serialNo: string;
  readonly budgetItemNo: string;
  readonly workName: string;
  readonly workNameLocal: string | null;

  readonly headOfAccount: string | null;
  readonly expenditureHead: string | null;

  readonly aaCost: number | null;
  readonly contractCost: number | null;
  readonly totalExpenditure: number;
  readonly centageRecovered: number | null;
  readonly unspentBalance: number | null;
  readonly refundRecorded: boolean;

  readonly aaDate: Date | null;
  readonly workOrderDate: Date | null;
  readonly originalTimeLimitDays: number | null;
  readonly physicalCompletionDate: Date | null;
  readonly dlpDays: number | null;

  readonly physicalProgressPercent: number | null;

  readonly roadCategory: RoadCategory | null;
  readonly roadNumber: string | null;
  readonly chainageFrom: number | null;
  readonly chainageTo: number | null;

  readonly isDepositWork: boolean;
  readonly workType: WorkType;
}

/** Lightweight pointer to a record, used in results and notes. */
export interface RecordRef {
  readonly id: string;
  readonly rowNumber: number;
  readonly serialNo: string;
  readonly budgetItemNo: string;
  readonly workName: string;
}

export type DataQualityNoteKind =
  | 'EXCLUDED_RECORD'
  | 'DUPLICATE_RECORD'
  | 'RULE_SKIPPED'
  | 'UNKNOWN_COLUMN';

export interface DataQualityNote {
  readonly kind: DataQualityNoteKind;
  readonly rowNumber: number | null;
  readonly recordId: string | null;
  readonly flagId: number | null;
  readonly message: string;
  readonly fields: readonly string[];
}

export type RecordParseResult =
  | { ok: true; record: WorkRecord }
  | { ok: false; note: DataQualityNote };
