/**
 * Page-numbered listings. Pages count from 1; every index is newest first.
 */

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface PageParams {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  entries: T[];
  pageNumber: number;
  pageSize: number;
  totalEntries: number;
  totalPages: number;
}

export const FIRST_PAGE: PageParams = { page: 1, pageSize: DEFAULT_PAGE_SIZE };

export function pageOffset(params: PageParams): number {
  return (params.page - 1) * params.pageSize;
}

export function toPage<T>(entries: T[], totalEntries: number, params: PageParams): Page<T> {
  return {
    entries,
    pageNumber: params.page,
    pageSize: params.pageSize,
    totalEntries,
    totalPages: Math.ceil(totalEntries / params.pageSize),
  };
}

/** Slice an already ordered list. */
export function paginate<T>(items: T[], params: PageParams): Page<T> {
  const offset = pageOffset(params);
  return toPage(items.slice(offset, offset + params.pageSize), items.length, params);
}
