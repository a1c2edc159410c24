import { HttpClient } from '../client/lib/client';
import { IndexDocument } from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import {
  CollectionAlias,
  CollectionInfo,
  CollectionSchema,
  ImportResult,
  SearchBackend,
  SearchParams,
  SearchPreset,
  SearchResult,
} from './interfaces/search-backend.interface';

export interface TypesenseClientOptions {
  baseURL: string;
  apiKey?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

function isImportResult(value: unknown): value is ImportResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

/**
 * Parses the JSON-lines body of a bulk import response. Lines that are not
 * import results are reported as failures so the counts stay aligned with
 * the submitted documents.
 */
export function parseImportResponse(body: string): ImportResult[] {
  return body
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        return { success: false, error: `Unparseable import result: ${errorMessage(error)}` };
      }
      return isImportResult(parsed)
        ? parsed
        : { success: false, error: `Unexpected import result: ${line}` };
    });
}

/**
 * Typesense REST API over the shared HTTP client
 */
export class TypesenseClient implements SearchBackend {
  private readonly http: HttpClient;

  constructor(options: TypesenseClientOptions) {
    const { baseURL, apiKey, timeout, maxRetries, retryDelay } = options;
    this.http = new HttpClient({
      baseURL,
      timeout,
      maxRetries,
      retryDelay,
      headers: apiKey ? { 'X-TYPESENSE-API-KEY': apiKey } : {},
    });
  }

  async health(timeout?: number): Promise<boolean> {
    const response = await this.http.get<{ ok?: boolean }>('/health', { timeout });
    return response.ok === true;
  }

  async retrieveCollections(): Promise<CollectionInfo[]> {
    return this.http.get<CollectionInfo[]>('/collections');
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<CollectionInfo> {
    return this.http.post<CollectionInfo>('/collections', { ...schema, name });
  }

  async deleteCollection(name: string): Promise<void> {
    await this.http.delete<CollectionInfo>(`/collections/${encodeURIComponent(name)}`);
  }

  async retrieveAliases(): Promise<CollectionAlias[]> {
    const response = await this.http.get<{ aliases?: CollectionAlias[] }>('/aliases');
    return response.aliases ?? [];
  }

  async upsertAlias(name: string, collectionName: string): Promise<CollectionAlias> {
    return this.http.put<CollectionAlias>(`/aliases/${encodeURIComponent(name)}`, {
      collection_name: collectionName,
    });
  }

  async importDocuments(
    collectionName: string,
    documents: IndexDocument[],
    action: 'create' | 'upsert' | 'update',
  ): Promise<ImportResult[]> {
    const body = documents.map(document => JSON.stringify(document)).join('\n');
    const response = await this.http.post<string>(
      `/collections/${encodeURIComponent(collectionName)}/documents/import`,
      body,
      {
        params: { action },
        headers: { 'Content-Type': 'text/plain' },
        responseType: 'text',
      },
    );
    return parseImportResponse(response);
  }

  async upsertPreset(preset: SearchPreset): Promise<void> {
    await this.http.put<SearchPreset>(`/presets/${encodeURIComponent(preset.name)}`, {
      value: preset.value,
    });
  }

  async search(collectionName: string, params: SearchParams): Promise<SearchResult> {
    return this.http.get<SearchResult>(
      `/collections/${encodeURIComponent(collectionName)}/documents/search`,
      { params },
    );
  }
}
