import { HttpClient } from '../client/lib/client';
import { URIMap } from '../common/interfaces/document-provider.interface';
import { ContentSource, Repo } from './interfaces/content-source.interface';

export interface ContentServerClientOptions {
  baseURL: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

/**
 * JSON client for the content server's repo and URI handlers
 */
export class ContentServerClient implements ContentSource {
  private readonly http: HttpClient;

  constructor(options: ContentServerClientOptions) {
    this.http = new HttpClient(options);
  }

  async getRepo(): Promise<Repo> {
    return this.http.post<Repo>('/getRepo', {});
  }

  async getURIs(dimension: string, ids: string[]): Promise<URIMap> {
    if (ids.length === 0) {
      return {};
    }
    return this.http.post<URIMap>('/getURIs', { dimension, ids });
  }
}
