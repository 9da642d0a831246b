import 'reflect-metadata';
import { container } from 'tsyringe';
import { IPincodeReferenceLoader } from '../adapters/reference/pincode-reference.interface';
import { PincodeReferenceLoader } from '../adapters/reference/pincode-reference.loader';
import { SenderDirectoryAdapter } from '../adapters/sender/sender-directory.adapter';
import { ISenderDirectory } from '../adapters/sender/sender-directory.interface';
import { IMergePipeline } from '../services/merge-pipeline.interface';
import { Clock, MergePipelineService } from '../services/merge-pipeline.service';
import { IRecordEnricher } from '../services/record-enricher.interface';
import { RecordEnricherService } from '../services/record-enricher.service';
import { ISchemaMapper } from '../services/schema-mapper.interface';
import { SchemaMapperService } from '../services/schema-mapper.service';
import { ITableProcessor } from '../services/table-processor.interface';
import { TableProcessorService } from '../services/table-processor.service';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('MergeLayout', { useValue: config.layout });
  container.register('PinSheetName', { useValue: config.layout.pinSheetName });
  container.register('ColumnAliases', { useValue: config.columnAliases });
  container.register<Clock>('Clock', { useValue: () => new Date() });

  // Register adapters
  container.register<ITableProcessor>('ITableProcessor', {
    useClass: TableProcessorService
  });

  container.register<IPincodeReferenceLoader>('IPincodeReferenceLoader', {
    useClass: PincodeReferenceLoader
  });

  container.register<ISenderDirectory>('ISenderDirectory', {
    useClass: SenderDirectoryAdapter
  });

  // Register services
  container.register<ISchemaMapper>('ISchemaMapper', {
    useClass: SchemaMapperService
  });

  container.register<IRecordEnricher>('IRecordEnricher', {
    useClass: RecordEnricherService
  });

  container.register<IMergePipeline>('IMergePipeline', {
    useClass: MergePipelineService
  });
}
