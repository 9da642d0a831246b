// Domain types - clean models isolated from the spreadsheet formats they are read from

/**
 * Receives progress and diagnostic lines. Invoked synchronously, inline with processing.
 */
export type LogSink = (message: string) => void;

export interface ReferenceEntry {
  pincode: string;  // always 6 digits, never numeric-typed
  city: string;     // trimmed, uppercase
}

/**
 * Pincode to city lookup rows in file order. Duplicate pincodes are kept; the first one wins.
 */
export type ReferenceTable = readonly ReferenceEntry[];

export interface SenderProfile {
  fileNameKey: string;
  senderCity: string;
  senderPincode: string;
  senderName: string;
  senderAdd1: string;
  senderAdd2: string;
  senderAdd3: string;
}

/**
 * One row of an input table, keyed by its (possibly renamed) header.
 */
export type RawRecord = Record<string, string>;

export interface RawTable {
  headers: string[];
  rows: RawRecord[];
}

export interface InputFile {
  fileName: string;
  sheetName: string;  // '' for delimited text
  table: RawTable;
}

export const CANONICAL_FIELDS = [
  'SL',
  'Barcode',
  'REF',
  'SenderCity',
  'SenderPincode',
  'SenderName',
  'SenderADD1',
  'SenderADD2',
  'SenderADD3',
  'AddreCity',
  'AddrePincode',
  'AddreName',
  'AddreADD1',
  'Addre_ADD2',
  'Addre_ADD3',
  'ADDREMAIL',
  'ADDRMOBILE',
  'SENDERMOBILE',
  'Weight',
  'InsVal',
  'PrPdAmount',
  'PrPdType',
  'FMLisenceId',
  'FMSomNo',
  'Input File Name',
  'Sheet Name'
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

export type TextField = Exclude<CanonicalField, 'SL'>;

export type CanonicalRecord = { SL: number } & Record<TextField, string>;

/**
 * Address parts scanned, in order, when a record has no usable pincode.
 */
export const ADDRESS_FIELDS = ['AddreADD1', 'Addre_ADD2', 'Addre_ADD3'] as const satisfies readonly TextField[];

export const COMPOSITE_ADDRESS_FIELD = 'AddreADD1';

export function createBlankRecord(sl: number): CanonicalRecord {
  return {
    SL: sl,
    Barcode: '',
    REF: '',
    SenderCity: '',
    SenderPincode: '',
    SenderName: '',
    SenderADD1: '',
    SenderADD2: '',
    SenderADD3: '',
    AddreCity: '',
    AddrePincode: '',
    AddreName: '',
    AddreADD1: '',
    Addre_ADD2: '',
    Addre_ADD3: '',
    ADDREMAIL: '',
    ADDRMOBILE: '',
    SENDERMOBILE: '',
    Weight: '',
    InsVal: '',
    PrPdAmount: '',
    PrPdType: '',
    FMLisenceId: '',
    FMSomNo: '',
    'Input File Name': '',
    'Sheet Name': ''
  };
}
