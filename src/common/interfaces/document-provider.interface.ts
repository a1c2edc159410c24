import { DocumentID, DocumentType, IndexDocument, IndexID } from './revision.interface';

/**
 * Indexable item found in the content tree.
 */
export interface DocumentDescriptor {
  documentType: DocumentType;
  documentID: DocumentID;
}

/**
 * Canonical locations keyed by document identity.
 */
export type URIMap = Record<string, string>;

export interface DocumentProviderContext {
  indexID: IndexID;
  descriptor: DocumentDescriptor;
  uriMap: URIMap;
}

/**
 * Builds one engine-ready document for a descriptor. Resolving to
 * `undefined` means the item has nothing to index.
 */
export type DocumentProviderFunc<T extends IndexDocument = IndexDocument> = (
  context: DocumentProviderContext,
) => Promise<T | undefined>;

export type DocumentProviderFuncs<T extends IndexDocument = IndexDocument> = Record<
  DocumentType,
  DocumentProviderFunc<T>
>;

/**
 * Source of documents per index. Slots stay positional: an empty slot is an
 * item that could not be assembled and must be skipped, not indexed.
 */
export interface DocumentProvider<T extends IndexDocument = IndexDocument> {
  provide(indexID: IndexID): Promise<Array<T | undefined>>;
  providePaged(indexID: IndexID, offset: number): Promise<PagedDocuments<T>>;
}

export interface PagedDocuments<T extends IndexDocument = IndexDocument> {
  documents: Array<T | undefined>;
  nextOffset: number;
}
