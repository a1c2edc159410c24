import { DynamicModule, Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ContentServerDocumentProvider } from '../document-provider/content-server-document.provider';
import {
  DocumentProviderModule,
  DocumentProviderModuleOptions,
} from '../document-provider/document-provider.module';
import { RevisionModule } from '../revision/revision.module';
import { IndexerScheduler } from './indexer.scheduler';
import { DOCUMENT_PROVIDER, IndexerService } from './indexer.service';

@Module({})
export class IndexerModule {
  static forRoot(options: DocumentProviderModuleOptions = {}): DynamicModule {
    return {
      module: IndexerModule,
      imports: [RevisionModule, DocumentProviderModule.forRoot(options), ScheduleModule.forRoot()],
      providers: [
        IndexerService,
        IndexerScheduler,
        { provide: DOCUMENT_PROVIDER, useExisting: ContentServerDocumentProvider },
      ],
      exports: [IndexerService],
    };
  }
}
