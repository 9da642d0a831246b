import { LogSink, ReferenceTable } from '../../types/domain.types';

/**
 * Loads the pincode to city reference workbook.
 */
export interface IPincodeReferenceLoader {
  /**
   * Never rejects: an unreadable or unrecognisable workbook yields an empty table, with the reason logged.
   */
  load(filePath: string, log: LogSink): Promise<ReferenceTable>;
}
