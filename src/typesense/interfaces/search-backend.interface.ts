import { IndexDocument } from '../../common/interfaces/revision.interface';

/**
 * Field definition of a collection schema
 */
export interface CollectionField {
  name: string;
  type: string;
  facet?: boolean;
  optional?: boolean;
  index?: boolean;
  sort?: boolean;
  locale?: string;
  [key: string]: unknown;
}

/**
 * Collection schema as configured per index. The name is assigned per
 * generation when the collection is created.
 */
export interface CollectionSchema {
  fields: CollectionField[];
  default_sorting_field?: string;
  token_separators?: string[];
  symbols_to_index?: string[];
  enable_nested_fields?: boolean;
}

export interface CollectionInfo {
  name: string;
  num_documents?: number;
  created_at?: number;
}

export interface CollectionAlias {
  name: string;
  collection_name: string;
}

export interface ImportResult {
  success: boolean;
  error?: string;
  document?: string;
}

/**
 * Reusable search parameters stored on the backend under a name
 */
export interface SearchPreset {
  name: string;
  value: Record<string, unknown>;
}

export interface SearchParams {
  q: string;
  query_by?: string;
  filter_by?: string;
  sort_by?: string;
  page?: number;
  per_page?: number;
  preset?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface SearchHit<T = Record<string, unknown>> {
  document: T;
  text_match?: number;
  text_match_info?: {
    score?: string;
    [key: string]: unknown;
  };
}

export interface SearchResult<T = Record<string, unknown>> {
  found: number;
  page?: number;
  hits: SearchHit<T>[];
}

/**
 * Collection, alias and document primitives of the search backend
 */
export interface SearchBackend {
  health(timeout?: number): Promise<boolean>;
  retrieveCollections(): Promise<CollectionInfo[]>;
  createCollection(name: string, schema: CollectionSchema): Promise<CollectionInfo>;
  deleteCollection(name: string): Promise<void>;
  retrieveAliases(): Promise<CollectionAlias[]>;
  upsertAlias(name: string, collectionName: string): Promise<CollectionAlias>;
  importDocuments(
    collectionName: string,
    documents: IndexDocument[],
    action: 'create' | 'upsert' | 'update',
  ): Promise<ImportResult[]>;
  upsertPreset(preset: SearchPreset): Promise<void>;
  search(collectionName: string, params: SearchParams): Promise<SearchResult>;
}

export const SEARCH_BACKEND = 'SEARCH_BACKEND';
