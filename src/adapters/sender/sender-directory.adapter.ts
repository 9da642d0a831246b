import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { ITableProcessor } from '../../services/table-processor.interface';
import { LogSink, RawRecord, SenderProfile } from '../../types/domain.types';
import { describeError, isSuccess } from '../../types/result.types';
import { ISenderDirectory } from './sender-directory.interface';

const TAG = '[Sender Directory]';

const optionalText = z.string().trim().optional().default('');

// Zod schema for validating one row of the sender workbook
const SenderRowSchema = z.object({
  'File Name Contain': z.string().trim().min(1, 'File Name Contain cannot be empty'),
  SenderCity: optionalText,
  SenderPincode: optionalText,
  SenderName: optionalText,
  SenderADD1: optionalText,
  SenderADD2: optionalText,
  SenderADD3: optionalText
});

/**
 * "ACME-march.txt" -> "ACME": cut at the first '-', then at the first '.', then trim.
 */
export function senderLookupKey(fileName: string): string {
  return fileName.split('-')[0].split('.')[0].trim();
}

@injectable()
export class SenderDirectoryAdapter implements ISenderDirectory {
  constructor(@inject('ITableProcessor') private readonly tableProcessor: ITableProcessor) {}

  async load(filePath: string, log: LogSink): Promise<SenderProfile[]> {
    const result = await this.tableProcessor.readSheet(filePath);
    if (!isSuccess(result)) {
      log(`${TAG} Error loading sender details: ${result.message}`);
      return [];
    }

    const senders: SenderProfile[] = [];
    result.data.table.rows.forEach((row, index) => {
      try {
        senders.push(this.mapToSenderProfile(row));
      } catch (error) {
        // Skip the row; a bad sender row never blocks the run
        log(`${TAG} Skipping invalid sender row ${index + 2}: ${describeError(error)}`);
      }
    });

    log(`${TAG} Successfully loaded sender details with ${senders.length} records`);
    return senders;
  }

  find(senders: readonly SenderProfile[], fileName: string): SenderProfile | undefined {
    const key = senderLookupKey(fileName).toLowerCase();
    return senders.find(sender => sender.fileNameKey.toLowerCase().includes(key));
  }

  private mapToSenderProfile(row: RawRecord): SenderProfile {
    const validationResult = SenderRowSchema.safeParse(row);

    if (!validationResult.success) {
      const errors = validationResult.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new Error(`Sender data validation failed: ${errors}`);
    }

    const validated = validationResult.data;

    return {
      fileNameKey: validated['File Name Contain'],
      senderCity: validated.SenderCity,
      senderPincode: validated.SenderPincode,
      senderName: validated.SenderName,
      senderAdd1: validated.SenderADD1,
      senderAdd2: validated.SenderADD2,
      senderAdd3: validated.SenderADD3
    };
  }
}
