import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentProviderFuncs } from '../common/interfaces/document-provider.interface';
import { IndicesConfig } from '../config/indices.config';
import { ContentServerModule } from '../content-server/content-server.module';
import {
  ContentServerDocumentProvider,
  DOCUMENT_PROVIDER_FUNCS,
} from './content-server-document.provider';
import { createUriDocumentProviders } from './providers/uri-document.provider';

export interface DocumentProviderModuleOptions {
  // Provider function per document type; defaults to URI documents for every supported mime type
  documentProviders?: DocumentProviderFuncs;
}

@Module({})
export class DocumentProviderModule {
  static forRoot(options: DocumentProviderModuleOptions = {}): DynamicModule {
    return {
      module: DocumentProviderModule,
      imports: [ContentServerModule],
      providers: [
        {
          provide: DOCUMENT_PROVIDER_FUNCS,
          useFactory: (configService: ConfigService): DocumentProviderFuncs =>
            options.documentProviders ??
            createUriDocumentProviders(
              configService.getOrThrow<IndicesConfig>('indices').supportedMimeTypes,
            ),
          inject: [ConfigService],
        },
        ContentServerDocumentProvider,
      ],
      exports: [ContentServerDocumentProvider],
    };
  }
}
