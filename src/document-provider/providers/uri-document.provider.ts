import {
  DocumentProviderFunc,
  DocumentProviderFuncs,
} from '../../common/interfaces/document-provider.interface';
import { IndexDocument } from '../../common/interfaces/revision.interface';

export interface UriDocument extends IndexDocument {
  type: string;
  uri: string;
}

/**
 * Minimal document carrying the identity, type and canonical URI of a
 * node. Nodes without a URI are not indexed.
 */
export const uriDocumentProvider: DocumentProviderFunc<UriDocument> = async ({
  descriptor,
  uriMap,
}) => {
  const uri = uriMap[descriptor.documentID];
  if (!uri) {
    return undefined;
  }
  return { id: descriptor.documentID, type: descriptor.documentType, uri };
};

export function createUriDocumentProviders(mimeTypes: string[]): DocumentProviderFuncs {
  const providers: DocumentProviderFuncs = {};
  for (const mimeType of mimeTypes) {
    providers[mimeType] = uriDocumentProvider;
  }
  return providers;
}
