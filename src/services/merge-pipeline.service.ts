import { mkdir, readdir, stat } from 'fs/promises';
import * as path from 'path';
import { inject, injectable } from 'tsyringe';
import { IPincodeReferenceLoader } from '../adapters/reference/pincode-reference.interface';
import { senderLookupKey } from '../adapters/sender/sender-directory.adapter';
import { ISenderDirectory } from '../adapters/sender/sender-directory.interface';
import { MergeLayout } from '../config/app.config';
import { InputFile, LogSink } from '../types/domain.types';
import { formatDiagnostic, isSuccess, MergeRunStatus, MergeRunSummary, Result } from '../types/result.types';
import { formatDayStamp } from '../utils/date.util';
import { IMergePipeline, MergeRunContext } from './merge-pipeline.interface';
import { IRecordEnricher } from './record-enricher.interface';
import { ITableProcessor } from './table-processor.interface';

const TAG = '[Merge Pipeline]';

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xls']);
const DELIMITED_TEXT_EXTENSIONS = new Set(['.txt', '.csv']);
const PREVIEW_COLUMN_COUNT = 5;

export type Clock = () => Date;

function isInputFile(fileName: string): boolean {
  const extension = path.extname(fileName).toLowerCase();
  return SPREADSHEET_EXTENSIONS.has(extension) || DELIMITED_TEXT_EXTENSIONS.has(extension);
}

function previewColumns(headers: readonly string[]): string {
  const preview = headers.slice(0, PREVIEW_COLUMN_COUNT).join(', ');
  return headers.length > PREVIEW_COLUMN_COUNT ? `${preview}...` : preview;
}

@injectable()
export class MergePipelineService implements IMergePipeline {
  constructor(
    @inject('ITableProcessor') private readonly tableProcessor: ITableProcessor,
    @inject('IPincodeReferenceLoader') private readonly referenceLoader: IPincodeReferenceLoader,
    @inject('ISenderDirectory') private readonly senderDirectory: ISenderDirectory,
    @inject('IRecordEnricher') private readonly recordEnricher: IRecordEnricher,
    @inject('MergeLayout') private readonly layout: MergeLayout,
    @inject('Clock') private readonly clock: Clock
  ) {}

  async run(baseDirectory: string, log: LogSink): Promise<MergeRunSummary> {
    let context: MergeRunContext = {
      reference: [],
      senders: [],
      batches: [],
      processedFiles: 0,
      errorFiles: 0
    };

    try {
      const pinFile = path.join(baseDirectory, this.layout.pinFileName);
      const senderFile = path.join(baseDirectory, this.layout.senderFileName);
      const inputDirectory = path.join(baseDirectory, this.layout.inputDirName);
      const outputDirectory = path.join(baseDirectory, this.layout.outputDirName);

      log(`${TAG} Base directory: ${baseDirectory}`);
      log(`${TAG} Looking for PIN file at: ${pinFile}`);
      log(`${TAG} Looking for sender details at: ${senderFile}`);
      log(`${TAG} Reading input files from: ${inputDirectory}`);
      log(`${TAG} Output will be saved to: ${outputDirectory}`);

      const reference = await this.referenceLoader.load(pinFile, log);
      if (reference.length === 0) {
        log(`${TAG} Error: PIN database not loaded. Processing stopped.`);
        return this.summarize(context, MergeRunStatus.ABORTED, 0);
      }

      const senders = await this.senderDirectory.load(senderFile, log);
      context = { ...context, reference, senders };

      if (!(await this.isDirectory(inputDirectory))) {
        log(`${TAG} Input directory not found: ${inputDirectory}`);
        return this.summarize(context, MergeRunStatus.ABORTED, 0);
      }

      const inputFiles = await this.listInputFiles(inputDirectory);
      log(`${TAG} Found ${inputFiles.length} input files to process`);

      for (const fileName of inputFiles) {
        context = await this.processFile(context, inputDirectory, fileName, log);
      }

      const merged = context.batches.flat();
      if (merged.length === 0) {
        log(`${TAG} No files were successfully processed.`);
        return this.summarize(context, MergeRunStatus.NO_OUTPUT, 0);
      }

      const { records } = this.recordEnricher.backfill(merged, context.reference, log);

      await mkdir(outputDirectory, { recursive: true });
      const outputPath = path.join(
        outputDirectory,
        `${this.layout.outputFilePrefix}${formatDayStamp(this.clock())}.xlsx`
      );

      log(`${TAG} Saving output file with ${records.length} total records...`);
      await this.tableProcessor.writeWorkbook(outputPath, records);
      log(`${TAG} Output saved to: ${outputPath}`);
      log(`${TAG} Total files processed successfully: ${context.processedFiles}`);
      log(`${TAG} Total files with errors: ${context.errorFiles}`);

      return { ...this.summarize(context, MergeRunStatus.COMPLETED, records.length), outputPath };
    } catch (error) {
      log(`${TAG} Unexpected error: ${formatDiagnostic(error)}`);
      return this.summarize(context, MergeRunStatus.ABORTED, 0);
    }
  }

  /**
   * Reads, maps and enriches one input file. Read failures and exceptions count
   * as errors; a file without a matching sender contributes nothing.
   */
  async processFile(
    context: MergeRunContext,
    inputDirectory: string,
    fileName: string,
    log: LogSink
  ): Promise<MergeRunContext> {
    log(`${TAG} Processing file: ${fileName}`);

    try {
      const readResult = await this.readInputFile(inputDirectory, fileName);
      if (!isSuccess(readResult)) {
        log(`${TAG} Error reading ${fileName}: ${readResult.message}`);
        return { ...context, errorFiles: context.errorFiles + 1 };
      }

      const input = readResult.data;
      log(`${TAG} Successfully read file with ${input.table.rows.length} rows and ${input.table.headers.length} columns`);
      log(`${TAG} Columns found: ${previewColumns(input.table.headers)}`);

      const key = senderLookupKey(fileName);
      const sender = this.senderDirectory.find(context.senders, fileName);
      if (!sender) {
        log(`${TAG} No sender details found for '${key}'; ${fileName} not merged`);
        return context;
      }

      log(`${TAG} Found matching sender details for '${key}'`);
      const records = this.recordEnricher.enrichFile(input, sender, log);
      log(`${TAG} Successfully processed: ${fileName}`);

      return {
        ...context,
        batches: [...context.batches, records],
        processedFiles: context.processedFiles + 1
      };
    } catch (error) {
      log(`${TAG} Error processing ${fileName}: ${formatDiagnostic(error)}`);
      return { ...context, errorFiles: context.errorFiles + 1 };
    }
  }

  private async readInputFile(inputDirectory: string, fileName: string): Promise<Result<InputFile>> {
    const filePath = path.join(inputDirectory, fileName);

    if (SPREADSHEET_EXTENSIONS.has(path.extname(fileName).toLowerCase())) {
      const result = await this.tableProcessor.readSheet(filePath);
      if (!isSuccess(result)) {
        return { success: false, message: result.message };
      }
      return {
        success: true,
        data: { fileName, sheetName: result.data.sheetName, table: result.data.table },
        message: result.message
      };
    }

    const result = await this.tableProcessor.readDelimitedText(filePath);
    if (!isSuccess(result)) {
      return { success: false, message: result.message };
    }
    return {
      success: true,
      data: { fileName, sheetName: '', table: result.data },
      message: result.message
    };
  }

  private async listInputFiles(inputDirectory: string): Promise<string[]> {
    const entries = await readdir(inputDirectory, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && isInputFile(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  private async isDirectory(directory: string): Promise<boolean> {
    try {
      return (await stat(directory)).isDirectory();
    } catch {
      return false;
    }
  }

  private summarize(context: MergeRunContext, status: MergeRunStatus, recordCount: number): MergeRunSummary {
    return {
      status,
      processedFiles: context.processedFiles,
      errorFiles: context.errorFiles,
      recordCount
    };
  }
}
