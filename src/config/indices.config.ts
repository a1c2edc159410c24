import { registerAs } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../common/errors/configuration.error';
import { IndexID } from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import { isRecord, isStringArray } from '../common/utils/type-guards';
import {
  CollectionField,
  CollectionSchema,
  SearchPreset,
} from '../typesense/interfaces/search-backend.interface';

/**
 * Index set definition: one collection schema per index plus the settings
 * shared by every build.
 */
export interface IndicesConfig {
  indices: Record<IndexID, CollectionSchema>;
  preset: SearchPreset | null;
  supportedMimeTypes: string[];
  // Node data attribute that opts a node out of indexing
  excludeAttribute: string;
  // Default query_by for simple searches
  queryBy: string;
}

export const DEFAULT_EXCLUDE_ATTRIBUTE = 'excludeFromSearch';
export const DEFAULT_QUERY_BY = 'title';

function isCollectionField(value: unknown): value is CollectionField {
  return isRecord(value) && typeof value.name === 'string' && typeof value.type === 'string';
}

function toCollectionSchema(indexID: string, value: unknown): CollectionSchema {
  if (!isRecord(value) || !Array.isArray(value.fields)) {
    throw new ConfigurationError(`Index ${indexID} has no fields array`);
  }
  const fields: CollectionField[] = [];
  for (const field of value.fields) {
    if (!isCollectionField(field)) {
      throw new ConfigurationError(`Index ${indexID} has a field without name or type`);
    }
    fields.push(field);
  }

  const schema: CollectionSchema = { fields };
  if (typeof value.default_sorting_field === 'string') {
    schema.default_sorting_field = value.default_sorting_field;
  }
  if (isStringArray(value.token_separators)) {
    schema.token_separators = value.token_separators;
  }
  if (isStringArray(value.symbols_to_index)) {
    schema.symbols_to_index = value.symbols_to_index;
  }
  if (typeof value.enable_nested_fields === 'boolean') {
    schema.enable_nested_fields = value.enable_nested_fields;
  }
  return schema;
}

function toPreset(value: unknown): SearchPreset | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isRecord(value) || typeof value.name !== 'string' || !isRecord(value.value)) {
    throw new ConfigurationError('Search preset needs a name and a value object');
  }
  return { name: value.name, value: value.value };
}

/**
 * Validates a parsed indices file. Throws ConfigurationError when no index
 * is configured or an entry is malformed.
 */
export function parseIndicesConfig(raw: unknown): IndicesConfig {
  if (!isRecord(raw) || !isRecord(raw.indices)) {
    throw new ConfigurationError('Indices configuration must contain an "indices" object');
  }

  const indices: Record<IndexID, CollectionSchema> = {};
  for (const [indexID, schema] of Object.entries(raw.indices)) {
    indices[indexID] = toCollectionSchema(indexID, schema);
  }
  if (Object.keys(indices).length === 0) {
    throw new ConfigurationError('No indices configured');
  }

  const supportedMimeTypes = raw.supportedMimeTypes ?? [];
  if (!isStringArray(supportedMimeTypes)) {
    throw new ConfigurationError('"supportedMimeTypes" must be an array of strings');
  }

  return {
    indices,
    preset: toPreset(raw.preset),
    supportedMimeTypes,
    excludeAttribute:
      typeof raw.excludeAttribute === 'string' ? raw.excludeAttribute : DEFAULT_EXCLUDE_ATTRIBUTE,
    queryBy: typeof raw.queryBy === 'string' ? raw.queryBy : DEFAULT_QUERY_BY,
  };
}

export function loadIndicesConfig(filePath: string): IndicesConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read indices configuration ${filePath}: ${errorMessage(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in indices configuration ${filePath}: ${errorMessage(error)}`,
    );
  }
  return parseIndicesConfig(raw);
}

export default registerAs('indices', () =>
  loadIndicesConfig(
    path.resolve(process.cwd(), process.env.INDICES_CONFIG_PATH || 'config/indices.json'),
  ),
);
