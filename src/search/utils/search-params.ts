import { SearchParams } from '../../typesense/interfaces/search-backend.interface';

/**
 * Builds a filter_by expression. A single value becomes `field:="value"`,
 * several values `field:["a","b"]`; clauses are AND-ed.
 */
export function formatFilterQuery(filterBy?: Record<string, string[]>): string {
  if (!filterBy) {
    return '';
  }

  const clauses: string[] = [];
  for (const [field, values] of Object.entries(filterBy)) {
    if (values.length === 0) {
      continue;
    }
    if (values.length === 1) {
      clauses.push(`${field}:="${values[0]}"`);
    } else {
      clauses.push(`${field}:[${values.map(value => `"${value}"`).join(',')}]`);
    }
  }

  return clauses.join(' && ');
}

export function buildSearchParams(
  q: string,
  filterBy: Record<string, string[]> | undefined,
  page: number,
  perPage: number,
  sortBy?: string,
): SearchParams {
  const params: SearchParams = { q, page, per_page: perPage };

  const filter = formatFilterQuery(filterBy);
  if (filter) {
    params.filter_by = filter;
  }
  if (sortBy) {
    params.sort_by = sortBy;
  }
  return params;
}
