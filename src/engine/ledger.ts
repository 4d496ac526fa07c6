import type {
  AmbiguousTransaction,
  FeeRecord,
  GainRecord,
  IncomeRecord,
  LedgerFlag,
  ReconciliationReport,
  ValidationError,
} from "@/engine/types";

/**
 * Append-only collection of everything a run emits. Records are frozen on
 * the way in; readers get read-only views.
 */
export class LedgerAccumulator {
  private readonly gainRecords: GainRecord[] = [];
  private readonly incomeRecords: IncomeRecord[] = [];
  private readonly reconciliationReports: ReconciliationReport[] = [];
  private readonly ledgerFlags: LedgerFlag[] = [];
  private readonly validationErrors: ValidationError[] = [];
  private readonly ambiguousTransactions: AmbiguousTransaction[] = [];
  private readonly feeRecords: FeeRecord[] = [];

  addGains(records: GainRecord[]): void {
    for (const record of records) {
      this.gainRecords.push(Object.freeze({ ...record }));
    }
  }

  addIncome(record: IncomeRecord): void {
    this.incomeRecords.push(Object.freeze({ ...record }));
  }

  addReports(reports: ReconciliationReport[]): void {
    for (const report of reports) {
      this.reconciliationReports.push(Object.freeze({ ...report }));
    }
  }

  addFlags(flags: LedgerFlag[]): void {
    for (const flag of flags) {
      this.ledgerFlags.push(Object.freeze({ ...flag }));
    }
  }

  addError(error: ValidationError): void {
    this.validationErrors.push(Object.freeze({ ...error }));
  }

  addFee(record: FeeRecord): void {
    this.feeRecords.push(Object.freeze({ ...record }));
  }

  addAmbiguous(classified: AmbiguousTransaction): void {
    this.ambiguousTransactions.push(classified);
  }

  get gains(): readonly GainRecord[] {
    return this.gainRecords;
  }

  get income(): readonly IncomeRecord[] {
    return this.incomeRecords;
  }

  get reconciliation(): readonly ReconciliationReport[] {
    return this.reconciliationReports;
  }

  get flags(): readonly LedgerFlag[] {
    return this.ledgerFlags;
  }

  get errors(): readonly ValidationError[] {
    return this.validationErrors;
  }

  get ambiguous(): readonly AmbiguousTransaction[] {
    return this.ambiguousTransactions;
  }

  get fees(): readonly FeeRecord[] {
    return this.feeRecords;
  }
}
