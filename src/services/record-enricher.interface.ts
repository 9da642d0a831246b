import { CanonicalRecord, InputFile, LogSink, ReferenceTable, SenderProfile } from '../types/domain.types';

export interface BackfillResult {
  records: CanonicalRecord[];
  extractedPincodes: number;
  mappedCities: number;
}

export interface IRecordEnricher {
  /**
   * Maps one input table onto the canonical schema, stamping sender details,
   * a per-file SL sequence and the file/sheet names on every row.
   */
  enrichFile(input: InputFile, sender: SenderProfile, log: LogSink): CanonicalRecord[];

  /**
   * Fills missing pincodes from the address parts and missing cities from the reference table.
   * Runs once over the merged batch and returns new records.
   */
  backfill(records: readonly CanonicalRecord[], reference: ReferenceTable, log: LogSink): BackfillResult;
}
