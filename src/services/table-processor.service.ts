import { readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { TextDecoder } from 'util';
import { parse } from 'csv-parse';
import { injectable } from 'tsyringe';
import * as XLSX from 'xlsx';
import { CANONICAL_FIELDS, CanonicalRecord, RawTable } from '../types/domain.types';
import { describeError, Result } from '../types/result.types';
import { buildRawTable, toCellText } from '../utils/table.util';
import { ITableProcessor, LoadedSheet } from './table-processor.interface';

const OUTPUT_SHEET_NAME = 'Sheet1';

// Opening bytes of an OOXML (zip) workbook and of a legacy OLE2 workbook
const WORKBOOK_SIGNATURES: Record<string, Buffer> = {
  '.xlsx': Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  '.xls': Buffer.from([0xd0, 0xcf, 0x11, 0xe0])
};

const GENERAL_FORMAT = 'General';

function hasWorkbookSignature(filePath: string, content: Buffer): boolean {
  const signature = WORKBOOK_SIGNATURES[path.extname(filePath).toLowerCase()];
  if (!signature) {
    return true;
  }
  return content.subarray(0, signature.length).equals(signature);
}

/**
 * Sets the text each cell is read as: formatted numbers (e.g. "000000") keep their
 * displayed text, unformatted numbers render in full, dates render as local calendar dates.
 */
function prepareCellText(cell: XLSX.CellObject): void {
  if (cell.t === 'd' && cell.v instanceof Date) {
    cell.w = toCellText(cell.v);
  } else if (cell.t === 'n' && (cell.z === undefined || cell.z === GENERAL_FORMAT)) {
    cell.w = toCellText(cell.v);
  }
}

@injectable()
export class TableProcessorService implements ITableProcessor {
  async readSheet(filePath: string, sheetName?: string): Promise<Result<LoadedSheet>> {
    let workbook: XLSX.WorkBook;
    try {
      const content = await readFile(filePath);
      if (!hasWorkbookSignature(filePath, content)) {
        return {
          success: false,
          message: `Failed to read workbook ${filePath}: not a valid ${path.extname(filePath).toLowerCase()} file`
        };
      }
      workbook = XLSX.read(content, { type: 'buffer', cellDates: true, cellNF: true });
    } catch (error) {
      return {
        success: false,
        message: `Failed to read workbook ${filePath}: ${describeError(error)}`
      };
    }

    const targetSheet = sheetName ?? workbook.SheetNames[0];
    if (targetSheet === undefined) {
      return { success: false, message: `Workbook ${filePath} contains no sheets` };
    }

    const worksheet = workbook.Sheets[targetSheet];
    if (!worksheet) {
      return {
        success: true,
        message: `Sheet ${targetSheet} not found in ${filePath}`
      };
    }

    for (const [address, cell] of Object.entries(worksheet)) {
      if (!address.startsWith('!')) {
        prepareCellText(cell);
      }
    }

    // header: 1 gives an array of arrays; raw: false returns each cell's text
    const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      raw: false,
      defval: '',
      blankrows: false
    });

    return {
      success: true,
      data: { sheetName: targetSheet, table: buildRawTable(matrix) },
      message: `Sheet ${targetSheet} read from ${filePath}`
    };
  }

  async readDelimitedText(filePath: string): Promise<Result<RawTable>> {
    try {
      const content = await readFile(filePath);
      // fatal: invalid UTF-8 is a read error, not silently replaced
      const text = new TextDecoder('utf-8', { fatal: true }).decode(content);
      const matrix = await this.parseTabDelimited(text);
      return {
        success: true,
        data: buildRawTable(matrix),
        message: `Delimited text read from ${filePath}`
      };
    } catch (error) {
      return {
        success: false,
        message: `Failed to read delimited text ${filePath}: ${describeError(error)}`
      };
    }
  }

  async writeWorkbook(outputPath: string, records: CanonicalRecord[]): Promise<void> {
    const worksheet = XLSX.utils.json_to_sheet(records, { header: [...CANONICAL_FIELDS] });
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, OUTPUT_SHEET_NAME);

    const output: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    await writeFile(outputPath, output);
  }

  private parseTabDelimited(content: string): Promise<string[][]> {
    return new Promise((resolve, reject) => {
      parse(
        content,
        {
          delimiter: '\t',
          bom: true,
          relax_quotes: true,
          relax_column_count_less: true,
          skip_empty_lines: true
        },
        (err, records: string[][]) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(records);
        }
      );
    });
  }
}
