import { URIMap } from '../../common/interfaces/document-provider.interface';

/**
 * Node of the content server tree. Children are keyed by their identity.
 */
export interface RepoNode {
  id: string;
  mimeType: string;
  hidden?: boolean;
  name?: string;
  uri?: string;
  data?: Record<string, unknown>;
  nodes?: Record<string, RepoNode | null>;
  index?: string[];
}

/**
 * Root nodes keyed by dimension
 */
export type Repo = Record<string, RepoNode | null>;

export interface ContentSource {
  getRepo(): Promise<Repo>;
  getURIs(dimension: string, ids: string[]): Promise<URIMap>;
}

export const CONTENT_SOURCE = 'CONTENT_SOURCE';
