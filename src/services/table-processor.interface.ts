import { CanonicalRecord, RawTable } from '../types/domain.types';
import { Result } from '../types/result.types';

export interface LoadedSheet {
  sheetName: string;
  table: RawTable;
}

export interface ITableProcessor {
  /**
   * Reads one sheet of a workbook, or the first sheet when no name is given.
   * @returns Result with data on success, success without data if the named sheet is absent, failure if the file cannot be read
   */
  readSheet(filePath: string, sheetName?: string): Promise<Result<LoadedSheet>>;

  /**
   * Reads a tab-delimited UTF-8 text file. All values stay text.
   */
  readDelimitedText(filePath: string): Promise<Result<RawTable>>;

  writeWorkbook(outputPath: string, records: CanonicalRecord[]): Promise<void>;
}
