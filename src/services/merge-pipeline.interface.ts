import { CanonicalRecord, LogSink, ReferenceTable, SenderProfile } from '../types/domain.types';
import { MergeRunSummary } from '../types/result.types';

/**
 * Accumulated state of one run, handed from stage to stage.
 */
export interface MergeRunContext {
  readonly reference: ReferenceTable;
  readonly senders: readonly SenderProfile[];
  readonly batches: readonly CanonicalRecord[][];
  readonly processedFiles: number;
  readonly errorFiles: number;
}

export interface IMergePipeline {
  /**
   * Merges every input file under the base directory into one output workbook.
   * Never rejects; failures are logged and reflected in the summary.
   */
  run(baseDirectory: string, log: LogSink): Promise<MergeRunSummary>;
}
