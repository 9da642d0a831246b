import { CanonicalField, LogSink, RawTable } from '../types/domain.types';

export interface ColumnRename {
  source: string;
  target: CanonicalField;
}

export interface MappedTable {
  table: RawTable;
  renames: ColumnRename[];
  addressColumns: string[];
}

export interface ISchemaMapper {
  /**
   * Renames recognised columns onto canonical fields and joins the address columns into AddreADD1.
   * The input table is left untouched.
   */
  mapTable(table: RawTable, log: LogSink): MappedTable;
}
