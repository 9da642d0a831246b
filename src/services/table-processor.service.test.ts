import 'reflect-metadata';
import { writeFile } from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { CANONICAL_FIELDS, createBlankRecord } from '../types/domain.types';
import { isFailure, isNotFound, isSuccess } from '../types/result.types';
import {
  createTempDirectory,
  removeTempDirectory,
  toTabDelimited,
  writeSheetsFixture,
  writeWorkbookFixture
} from '../testing/workbook.fixture';
import { TableProcessorService } from './table-processor.service';

describe('TableProcessorService', () => {
  let workDir: string;
  let processor: TableProcessorService;

  beforeEach(async () => {
    workDir = await createTempDirectory();
    processor = new TableProcessorService();
  });

  afterEach(async () => {
    await removeTempDirectory(workDir);
  });

  describe('readSheet', () => {
    it('should read the named sheet with every value as text', async () => {
      // Arrange: Workbook where the wanted sheet is not the first one
      const filePath = path.join(workDir, 'PIN.xlsx');
      await writeWorkbookFixture(filePath, {
        Notes: [['ignored']],
        TBLPINCITY: [['PINCODE', 'CITY'], [110001, 'New Delhi'], ['012345', 'Testpur']]
      });

      // Act
      const result = await processor.readSheet(filePath, 'TBLPINCITY');

      // Assert: Numeric cell rendered as digits, leading zero kept
      expect(isSuccess(result)).toBe(true);
      expect(isSuccess(result) && result.data).toEqual({
        sheetName: 'TBLPINCITY',
        table: {
          headers: ['PINCODE', 'CITY'],
          rows: [
            { PINCODE: '110001', CITY: 'New Delhi' },
            { PINCODE: '012345', CITY: 'Testpur' }
          ]
        }
      });
    });

    it('should read the first sheet when no name is given', async () => {
      const filePath = path.join(workDir, 'input.xlsx');
      await writeWorkbookFixture(filePath, {
        Dispatch: [['Name'], ['Asha']],
        Other: [['Name'], ['Ravi']]
      });

      const result = await processor.readSheet(filePath);

      expect(isSuccess(result) && result.data.sheetName).toBe('Dispatch');
      expect(isSuccess(result) && result.data.table.rows).toEqual([{ Name: 'Asha' }]);
    });

    it('should report a missing sheet as not found', async () => {
      const filePath = path.join(workDir, 'PIN.xlsx');
      await writeWorkbookFixture(filePath, { Sheet1: [['PINCODE', 'CITY']] });

      const result = await processor.readSheet(filePath, 'TBLPINCITY');

      expect(isNotFound(result)).toBe(true);
      expect(result.message).toContain('TBLPINCITY');
    });

    it('should keep the displayed text of a zero-padded number format', async () => {
      // Arrange: Pincode stored as the number 12345 shown as 012345
      const filePath = path.join(workDir, 'PIN.xlsx');
      const worksheet = XLSX.utils.aoa_to_sheet([['PINCODE', 'CITY'], [12345, 'Testpur']]);
      worksheet['A2'].z = '000000';
      await writeSheetsFixture(filePath, { TBLPINCITY: worksheet });

      // Act
      const result = await processor.readSheet(filePath, 'TBLPINCITY');

      // Assert
      expect(isSuccess(result) && result.data.table.rows).toEqual([{ PINCODE: '012345', CITY: 'Testpur' }]);
    });

    it('should render long unformatted numbers in full', async () => {
      const filePath = path.join(workDir, 'input.xlsx');
      await writeWorkbookFixture(filePath, { Sheet1: [['Barcode'], [123456789012]] });

      const result = await processor.readSheet(filePath);

      expect(isSuccess(result) && result.data.table.rows).toEqual([{ Barcode: '123456789012' }]);
    });

    // Test: Suite runs at UTC+05:30, where an ISO rendering would give the 8th
    it('should read date cells as their local calendar date', async () => {
      const filePath = path.join(workDir, 'input.xlsx');
      await writeWorkbookFixture(filePath, { Sheet1: [['Dispatched'], [new Date(2024, 2, 9)]] });

      const result = await processor.readSheet(filePath);

      expect(isSuccess(result) && result.data.table.rows).toEqual([{ Dispatched: '2024-03-09' }]);
    });

    it('should fail on an .xlsx file that is not a workbook', async () => {
      const filePath = path.join(workDir, 'ACME-bad.xlsx');
      await writeFile(filePath, 'this is not a workbook\ngarbage line\n', 'utf-8');

      const result = await processor.readSheet(filePath);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toBe(`Failed to read workbook ${filePath}: not a valid .xlsx file`);
    });

    it('should fail on an .xls file that is not a workbook', async () => {
      const filePath = path.join(workDir, 'ACME-bad.XLS');
      await writeFile(filePath, 'Name\tPincode\nAsha\t682001\n', 'utf-8');

      const result = await processor.readSheet(filePath);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toBe(`Failed to read workbook ${filePath}: not a valid .xls file`);
    });

    it('should fail when the file does not exist', async () => {
      const result = await processor.readSheet(path.join(workDir, 'missing.xlsx'));

      expect(isFailure(result)).toBe(true);
      expect(result.message).toContain('Failed to read workbook');
    });
  });

  describe('readDelimitedText', () => {
    it('should parse tab-separated text keeping codes as text', async () => {
      const filePath = path.join(workDir, 'BANK-march.txt');
      await writeFile(filePath, '\uFEFF' + toTabDelimited([
        ['Name', 'Pin code', 'Address'],
        ['Asha', '012345', '4 "Lotus" Apartments, Pune'],
        ['Ravi', '560034']
      ]), 'utf-8');

      const result = await processor.readDelimitedText(filePath);

      expect(isSuccess(result) && result.data).toEqual({
        headers: ['Name', 'Pin code', 'Address'],
        rows: [
          { 'Name': 'Asha', 'Pin code': '012345', 'Address': '4 "Lotus" Apartments, Pune' },
          { 'Name': 'Ravi', 'Pin code': '560034', 'Address': '' }
        ]
      });
    });

    it('should fail on an unterminated quoted field', async () => {
      const filePath = path.join(workDir, 'broken.txt');
      await writeFile(filePath, 'Name\tAddress\n"Asha\t12 Main Road\n', 'utf-8');

      const result = await processor.readDelimitedText(filePath);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toContain('Failed to read delimited text');
    });

    it('should fail on bytes that are not valid UTF-8', async () => {
      const filePath = path.join(workDir, 'latin1.txt');
      await writeFile(filePath, Buffer.from([0x4e, 0x61, 0x6d, 0x65, 0x0a, 0x52, 0xe9, 0x6d, 0x79, 0x0a]));

      const result = await processor.readDelimitedText(filePath);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toContain('Failed to read delimited text');
    });

    it('should fail when a row has more fields than the header', async () => {
      const filePath = path.join(workDir, 'wide.txt');
      await writeFile(filePath, toTabDelimited([['Name'], ['Asha', 'extra']]), 'utf-8');

      const result = await processor.readDelimitedText(filePath);

      expect(isFailure(result)).toBe(true);
    });
  });

  describe('writeWorkbook', () => {
    it('should write the canonical columns in order', async () => {
      // Arrange
      const outputPath = path.join(workDir, 'out.xlsx');
      const records = [
        { ...createBlankRecord(1), AddreName: 'Asha', AddrePincode: '012345', 'Input File Name': 'a.txt' },
        { ...createBlankRecord(2), AddreName: 'Ravi' }
      ];

      // Act: Write then read back
      await processor.writeWorkbook(outputPath, records);
      const result = await processor.readSheet(outputPath);

      // Assert
      expect(isSuccess(result)).toBe(true);
      if (!isSuccess(result)) return;
      expect(result.data.sheetName).toBe('Sheet1');
      expect(result.data.table.headers).toEqual([...CANONICAL_FIELDS]);
      expect(result.data.table.rows).toHaveLength(2);
      expect(result.data.table.rows[0].SL).toBe('1');
      expect(result.data.table.rows[0].AddrePincode).toBe('012345');
      expect(result.data.table.rows[0]['Input File Name']).toBe('a.txt');
      expect(result.data.table.rows[1].AddreName).toBe('Ravi');
    });
  });
});
