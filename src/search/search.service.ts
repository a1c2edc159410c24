import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors/configuration.error';
import { IndexDocument, IndexID, Scores } from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import { IndicesConfig } from '../config/indices.config';
import {
  SEARCH_BACKEND,
  SearchBackend,
  SearchParams,
  SearchResult,
} from '../typesense/interfaces/search-backend.interface';
import { buildSearchParams } from './utils/search-params';

const INTEGER_PATTERN = /^-?\d+$/;

export interface SearchResponse {
  documents: IndexDocument[];
  scores: Scores;
  found: number;
}

/**
 * Queries the public alias of an index, so results always come from the
 * committed generation.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);
  private readonly queryBy: string;

  constructor(
    @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
    configService: ConfigService,
  ) {
    this.queryBy = configService.getOrThrow<IndicesConfig>('indices').queryBy;
  }

  async simpleSearch(
    indexID: IndexID,
    q: string,
    filterBy: Record<string, string[]> | undefined,
    page: number,
    perPage: number,
    sortBy?: string,
  ): Promise<SearchResponse> {
    const params = buildSearchParams(q, filterBy, page, perPage, sortBy);
    params.query_by = this.queryBy;
    return this.expertSearch(indexID, params);
  }

  async expertSearch(indexID: IndexID, params?: SearchParams | null): Promise<SearchResponse> {
    if (!params) {
      this.logger.error('Search parameters are missing');
      throw new ConfigurationError('Search parameters cannot be empty');
    }

    let result: SearchResult;
    try {
      result = await this.backend.search(indexID, params);
    } catch (error) {
      this.logger.error(`Failed to perform search on ${indexID}: ${errorMessage(error)}`);
      throw error;
    }

    const documents: IndexDocument[] = [];
    const scores: Scores = {};

    for (const hit of result.hits) {
      const id = hit.document.id;
      if (typeof id !== 'string') {
        this.logger.warn(`Missing or invalid document ID in search result of ${indexID}`);
        continue;
      }

      documents.push({ ...hit.document, id });
      scores[id] = { id, index: this.parseScore(hit.text_match_info?.score) };
    }

    this.logger.log(`Search on ${indexID} completed with ${documents.length} results`);
    return { documents, scores, found: result.found };
  }

  private parseScore(score: string | undefined): bigint {
    if (score === undefined) {
      return 0n;
    }
    const trimmed = score.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      this.logger.warn(`Invalid score value ${score}`);
      return 0n;
    }
    return BigInt(trimmed);
  }
}
