/** Reason kinds for a row excluded from the load. */
export const RejectionKind = {
  COLUMN_COUNT_MISMATCH: 'ColumnCountMismatch',
  MISSING_MANDATORY_FIELD: 'MissingMandatoryField',
  BAD_TAX_ID: 'BadTaxId',
  BAD_DECIMAL: 'BadDecimal',
  BAD_DATE: 'BadDate',
} as const;

export type RejectionKind = (typeof RejectionKind)[keyof typeof RejectionKind];

/** Why the normalizer refused a record. Returned, never thrown. */
export interface RejectionReason {
  readonly kind: RejectionKind;
  /** Canonical column that caused the rejection (absent for structural defects). */
  readonly field?: string;
  /** The offending raw value. */
  readonly value?: string;
  readonly message: string;
}

/** A rejection tied to the source line it came from. */
export interface RowRejection extends RejectionReason {
  readonly lineNumber: number;
}

/** Rejection counts by kind. Every kind is always present. */
export type RejectionTally = Readonly<Record<RejectionKind, number>>;

export function emptyTally(): RejectionTally {
  return {
    ColumnCountMismatch: 0,
    MissingMandatoryField: 0,
    BadTaxId: 0,
    BadDecimal: 0,
    BadDate: 0,
  };
}

export function incrementTally(tally: RejectionTally, kind: RejectionKind): RejectionTally {
  return { ...tally, [kind]: tally[kind] + 1 };
}

export function mergeTallies(a: RejectionTally, b: RejectionTally): RejectionTally {
  return {
    ColumnCountMismatch: a.ColumnCountMismatch + b.ColumnCountMismatch,
    MissingMandatoryField: a.MissingMandatoryField + b.MissingMandatoryField,
    BadTaxId: a.BadTaxId + b.BadTaxId,
    BadDecimal: a.BadDecimal + b.BadDecimal,
    BadDate: a.BadDate + b.BadDate,
  };
}

export function tallyTotal(tally: RejectionTally): number {
  return Object.values(tally).reduce((sum, n) => sum + n, 0);
}
