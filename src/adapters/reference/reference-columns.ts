import { ReferenceTable } from '../../types/domain.types';

export type ReferenceColumnStrategy = 'exact' | 'partial' | 'positional';

export interface ReferenceColumns {
  pincodeColumn: string;
  cityColumn: string;
  strategy: ReferenceColumnStrategy;
}

const PINCODE_NAME = 'PINCODE';
const CITY_NAME = 'CITY';
const PINCODE_FRAGMENT = 'PIN';
const CITY_FRAGMENT = 'CITY';

/**
 * Picks the pincode and city columns of a reference sheet: exact names first,
 * then names containing PIN / CITY, then the first two columns.
 */
export function resolveReferenceColumns(headers: readonly string[]): ReferenceColumns | undefined {
  const normalized = headers.map(header => header.trim().toUpperCase());

  const exactPincode = headers.find((_, i) => normalized[i] === PINCODE_NAME);
  const exactCity = headers.find((_, i) => normalized[i] === CITY_NAME);
  if (exactPincode !== undefined && exactCity !== undefined) {
    return { pincodeColumn: exactPincode, cityColumn: exactCity, strategy: 'exact' };
  }

  const pincodeColumn = exactPincode ?? headers.find((_, i) => normalized[i].includes(PINCODE_FRAGMENT));
  const cityColumn = exactCity ?? headers.find((_, i) => normalized[i].includes(CITY_FRAGMENT));
  if (pincodeColumn !== undefined && cityColumn !== undefined && pincodeColumn !== cityColumn) {
    return { pincodeColumn, cityColumn, strategy: 'partial' };
  }

  if (headers.length >= 2) {
    return { pincodeColumn: headers[0], cityColumn: headers[1], strategy: 'positional' };
  }

  return undefined;
}

/**
 * Pincode to city index; for duplicate pincodes the first row wins.
 */
export function indexByPincode(table: ReferenceTable): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const entry of table) {
    if (!index.has(entry.pincode)) {
      index.set(entry.pincode, entry.city);
    }
  }
  return index;
}
