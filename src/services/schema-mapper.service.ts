import { inject, injectable } from 'tsyringe';
import { ColumnAliases } from '../config/column-aliases';
import { COMPOSITE_ADDRESS_FIELD, LogSink, RawRecord, RawTable } from '../types/domain.types';
import { ColumnRename, ISchemaMapper, MappedTable } from './schema-mapper.interface';

const TAG = '[Schema Mapper]';
const ADDRESS_SEPARATOR = ', ';

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * First header equal to an alias, trying aliases in order. Exact match only, ignoring case and padding.
 */
export function matchSingleColumn(headers: readonly string[], aliases: readonly string[]): string | undefined {
  const normalized = headers.map(normalizeHeader);
  for (const alias of aliases) {
    const index = normalized.indexOf(normalizeHeader(alias));
    if (index !== -1) {
      return headers[index];
    }
  }
  return undefined;
}

/**
 * Every header equal to any alias, in table order.
 */
export function matchAllColumns(headers: readonly string[], aliases: readonly string[]): string[] {
  const wanted = new Set(aliases.map(normalizeHeader));
  return headers.filter(header => wanted.has(normalizeHeader(header)));
}

export function joinAddressParts(row: RawRecord, columns: readonly string[]): string {
  return columns
    .map(column => row[column] ?? '')
    .filter(part => part.trim() !== '')
    .join(ADDRESS_SEPARATOR)
    .trim();
}

@injectable()
export class SchemaMapperService implements ISchemaMapper {
  constructor(@inject('ColumnAliases') private readonly aliases: ColumnAliases) {}

  mapTable(table: RawTable, log: LogSink): MappedTable {
    const renames = this.planRenames(table.headers, log);
    const renamed = this.applyRenames(table, renames);

    const addressColumns = matchAllColumns(renamed.headers, this.aliases.address);
    if (addressColumns.length === 0) {
      log(`${TAG} No address columns found`);
      return { table: renamed, renames, addressColumns };
    }

    log(`${TAG} Found address columns: ${addressColumns.join(', ')}`);

    const headers = renamed.headers.includes(COMPOSITE_ADDRESS_FIELD)
      ? renamed.headers
      : [...renamed.headers, COMPOSITE_ADDRESS_FIELD];
    const rows = renamed.rows.map(row => ({
      ...row,
      [COMPOSITE_ADDRESS_FIELD]: joinAddressParts(row, addressColumns)
    }));

    return { table: { headers, rows }, renames, addressColumns };
  }

  private planRenames(headers: readonly string[], log: LogSink): ColumnRename[] {
    const renames: ColumnRename[] = [];
    const claimed = new Set<string>();

    for (const rule of this.aliases.single) {
      const source = matchSingleColumn(headers, rule.aliases);
      if (source === undefined) {
        continue;
      }
      if (claimed.has(source)) {
        log(`${TAG} Column '${source}' already mapped, not mapping it to '${rule.field}'`);
        continue;
      }
      claimed.add(source);
      renames.push({ source, target: rule.field });
      log(`${TAG} Mapped '${source}' to '${rule.field}'`);
    }

    return renames;
  }

  private applyRenames(table: RawTable, renames: readonly ColumnRename[]): RawTable {
    const targetBySource = new Map<string, string>(renames.map(r => [r.source, r.target]));
    const targets = new Set<string>(targetBySource.values());

    // A renamed column replaces an unmapped column that already carries the canonical name
    const kept = table.headers.filter(header => targetBySource.has(header) || !targets.has(header));
    const headers = kept.map(header => targetBySource.get(header) ?? header);

    const rows = table.rows.map(row => {
      const next: RawRecord = {};
      kept.forEach((header, index) => {
        next[headers[index]] = row[header] ?? '';
      });
      return next;
    });

    return { headers, rows };
  }
}
