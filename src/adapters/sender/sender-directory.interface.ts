import { LogSink, SenderProfile } from '../../types/domain.types';

/**
 * Sender details keyed by a fragment of the input file name.
 */
export interface ISenderDirectory {
  /**
   * Loads sender profiles. A missing or unreadable workbook yields an empty list.
   */
  load(filePath: string, log: LogSink): Promise<SenderProfile[]>;

  /**
   * First profile whose key contains the file's lookup key, case-insensitively.
   */
  find(senders: readonly SenderProfile[], fileName: string): SenderProfile | undefined;
}
