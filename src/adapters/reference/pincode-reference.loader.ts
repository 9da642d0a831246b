import { inject, injectable } from 'tsyringe';
import { ITableProcessor, LoadedSheet } from '../../services/table-processor.interface';
import { LogSink, ReferenceEntry, ReferenceTable } from '../../types/domain.types';
import { formatDiagnostic, isSuccess } from '../../types/result.types';
import { cleanPincode } from '../../utils/pincode.util';
import { IPincodeReferenceLoader } from './pincode-reference.interface';
import { resolveReferenceColumns } from './reference-columns';

const TAG = '[PIN Loader]';

@injectable()
export class PincodeReferenceLoader implements IPincodeReferenceLoader {
  constructor(
    @inject('ITableProcessor') private readonly tableProcessor: ITableProcessor,
    @inject('PinSheetName') private readonly preferredSheet: string
  ) {}

  async load(filePath: string, log: LogSink): Promise<ReferenceTable> {
    try {
      log(`${TAG} Loading PIN database from: ${filePath}`);

      const sheet = await this.readReferenceSheet(filePath, log);
      if (!sheet) {
        return [];
      }

      const { headers, rows } = sheet.table;
      log(`${TAG} Found columns in PIN file: ${headers.join(', ')}`);

      const columns = resolveReferenceColumns(headers);
      if (!columns) {
        log(`${TAG} Error: Could not identify pincode and city columns in ${filePath}`);
        return [];
      }

      if (columns.strategy === 'positional') {
        log(`${TAG} Using first column '${columns.pincodeColumn}' as pincode and second column '${columns.cityColumn}' as city`);
      } else {
        log(`${TAG} Using '${columns.pincodeColumn}' as pincode column and '${columns.cityColumn}' as city column`);
      }

      const entries: ReferenceEntry[] = [];
      for (const row of rows) {
        const pincode = cleanPincode(row[columns.pincodeColumn]);
        if (pincode.length !== 6) {
          continue;
        }
        entries.push({ pincode, city: row[columns.cityColumn].trim().toUpperCase() });
      }

      log(`${TAG} Loaded ${entries.length} valid pincodes from PIN database`);
      return entries;
    } catch (error) {
      log(`${TAG} Error loading PIN database: ${formatDiagnostic(error)}`);
      return [];
    }
  }

  private async readReferenceSheet(filePath: string, log: LogSink): Promise<LoadedSheet | undefined> {
    const preferred = await this.tableProcessor.readSheet(filePath, this.preferredSheet);
    if (isSuccess(preferred)) {
      log(`${TAG} Successfully loaded ${this.preferredSheet} sheet`);
      return preferred.data;
    }

    log(`${TAG} ${this.preferredSheet} sheet not available: ${preferred.message}`);
    log(`${TAG} Trying the first sheet instead...`);

    const fallback = await this.tableProcessor.readSheet(filePath);
    if (!isSuccess(fallback)) {
      log(`${TAG} Error loading PIN database: ${fallback.message}`);
      return undefined;
    }

    log(`${TAG} Using sheet: ${fallback.data.sheetName}`);
    return fallback.data;
  }
}
