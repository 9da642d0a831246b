import { inject, injectable } from 'tsyringe';
import { indexByPincode } from '../adapters/reference/reference-columns';
import {
  ADDRESS_FIELDS,
  CANONICAL_FIELDS,
  CanonicalRecord,
  createBlankRecord,
  InputFile,
  LogSink,
  RawRecord,
  ReferenceTable,
  SenderProfile,
  TextField
} from '../types/domain.types';
import { cleanPincode, extractPincodeFromText } from '../utils/pincode.util';
import { BackfillResult, IRecordEnricher } from './record-enricher.interface';
import { ISchemaMapper } from './schema-mapper.interface';

const TAG = '[Record Enricher]';

const TEXT_FIELDS: TextField[] = CANONICAL_FIELDS.filter((field): field is TextField => field !== 'SL');

function senderFields(sender: SenderProfile): Pick<CanonicalRecord, 'SenderCity' | 'SenderPincode' | 'SenderName' | 'SenderADD1' | 'SenderADD2' | 'SenderADD3'> {
  return {
    SenderCity: sender.senderCity,
    SenderPincode: sender.senderPincode,
    SenderName: sender.senderName,
    SenderADD1: sender.senderAdd1,
    SenderADD2: sender.senderAdd2,
    SenderADD3: sender.senderAdd3
  };
}

// Columns already carrying a canonical name flow through; everything else is dropped
function projectRow(row: RawRecord, sl: number): CanonicalRecord {
  const record = createBlankRecord(sl);
  for (const field of TEXT_FIELDS) {
    record[field] = row[field] ?? '';
  }
  return record;
}

@injectable()
export class RecordEnricherService implements IRecordEnricher {
  constructor(@inject('ISchemaMapper') private readonly schemaMapper: ISchemaMapper) {}

  enrichFile(input: InputFile, sender: SenderProfile, log: LogSink): CanonicalRecord[] {
    const { table } = this.schemaMapper.mapTable(input.table, log);
    const senderStamp = senderFields(sender);

    return table.rows.map((row, index) => ({
      ...projectRow(row, index + 1),
      ...senderStamp,
      'Input File Name': input.fileName,
      'Sheet Name': input.sheetName
    }));
  }

  backfill(records: readonly CanonicalRecord[], reference: ReferenceTable, log: LogSink): BackfillResult {
    log(`${TAG} Processing pincodes and cities for the merged records...`);

    const cityByPincode = indexByPincode(reference);
    let extractedPincodes = 0;
    let mappedCities = 0;

    const enriched = records.map(record => {
      let pincode = cleanPincode(record.AddrePincode);
      if (pincode === '') {
        for (const field of ADDRESS_FIELDS) {
          const found = extractPincodeFromText(record[field]);
          if (found !== '') {
            pincode = found;
            extractedPincodes++;
            break;
          }
        }
      }

      let city = record.AddreCity.trim();
      if (city === '' && pincode !== '') {
        const match = cityByPincode.get(pincode);
        if (match !== undefined) {
          city = match;
          mappedCities++;
        } else {
          log(`${TAG} Pincode ${pincode} not found in PIN database.`);
        }
      }

      return { ...record, AddrePincode: pincode, AddreCity: city };
    });

    log(`${TAG} Extracted ${extractedPincodes} pincodes from address fields`);
    log(`${TAG} Mapped ${mappedCities} cities from pincodes`);

    return { records: enriched, extractedPincodes, mappedCities };
  }
}
