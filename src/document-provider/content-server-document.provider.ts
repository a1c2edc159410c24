import { Inject, Injectable, Logger, NotImplementedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DocumentDescriptor,
  DocumentProvider,
  DocumentProviderFuncs,
  PagedDocuments,
  URIMap,
} from '../common/interfaces/document-provider.interface';
import { IndexDocument, IndexID } from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import { IndicesConfig } from '../config/indices.config';
import {
  CONTENT_SOURCE,
  ContentSource,
} from '../content-server/interfaces/content-source.interface';
import { ContentTreeFilter, extractDocumentDescriptors } from './content-tree';

export const DOCUMENT_PROVIDER_FUNCS = 'DOCUMENT_PROVIDER_FUNCS';

/**
 * Assembles the documents of an index from the content server tree. Each
 * descriptor is resolved by the provider function registered for its type.
 */
@Injectable()
export class ContentServerDocumentProvider implements DocumentProvider {
  private readonly logger = new Logger(ContentServerDocumentProvider.name);
  private readonly filter: ContentTreeFilter;

  constructor(
    @Inject(CONTENT_SOURCE) private readonly contentSource: ContentSource,
    @Inject(DOCUMENT_PROVIDER_FUNCS) private readonly providerFuncs: DocumentProviderFuncs,
    configService: ConfigService,
  ) {
    const { supportedMimeTypes, excludeAttribute } =
      configService.getOrThrow<IndicesConfig>('indices');
    this.filter = { supportedMimeTypes, excludeAttribute };
  }

  /**
   * Returns one slot per indexable descriptor. A slot stays empty when no
   * provider is registered for the type or the provider failed.
   */
  async provide(indexID: IndexID): Promise<Array<IndexDocument | undefined>> {
    const descriptors = await this.getDocumentDescriptors(indexID);

    let uriMap: URIMap;
    try {
      uriMap = await this.contentSource.getURIs(
        indexID,
        descriptors.map(descriptor => descriptor.documentID),
      );
    } catch (error) {
      this.logger.error(`Failed to get URIs for index ${indexID}: ${errorMessage(error)}`);
      throw error;
    }

    const documents = new Array<IndexDocument | undefined>(descriptors.length).fill(undefined);
    let missingProvider = 0;
    let failed = 0;

    for (const [position, descriptor] of descriptors.entries()) {
      const providerFunc = this.providerFuncs[descriptor.documentType];
      if (!providerFunc) {
        missingProvider++;
        this.logger.warn(
          `No document provider available for document type ${descriptor.documentType}`,
        );
        continue;
      }

      try {
        documents[position] = await providerFunc({ indexID, descriptor, uriMap });
      } catch (error) {
        failed++;
        this.logger.error(
          `Index document ${descriptor.documentID} (${descriptor.documentType}) not created: ${errorMessage(error)}`,
        );
      }
    }

    const provided = documents.filter(document => document !== undefined).length;
    this.logger.log(
      `Assembled ${provided} of ${descriptors.length} documents for index ${indexID} (${missingProvider} without provider, ${failed} failed)`,
    );

    return documents;
  }

  async providePaged(indexID: IndexID, offset: number): Promise<PagedDocuments> {
    throw new NotImplementedException(
      `Paged document provision is not implemented (index ${indexID}, offset ${offset})`,
    );
  }

  async getDocumentDescriptors(indexID: IndexID): Promise<DocumentDescriptor[]> {
    const repo = await this.contentSource.getRepo();
    const descriptors = extractDocumentDescriptors(repo, indexID, this.filter);
    this.logger.debug(`Found ${descriptors.length} indexable nodes for index ${indexID}`);
    return descriptors;
  }
}
