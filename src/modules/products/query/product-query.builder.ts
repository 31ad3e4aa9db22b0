import type { Document, Filter, SortDirection } from 'mongodb';
import type { RegexMode } from '../../../config/catalog.config';
import {
  FILTERABLE_SPEC_FIELDS,
  type FilterableSpecField,
} from '../../../lib/catalog/types';
import {
  containsPredicate,
  exactPredicate,
} from '../../../lib/catalog/match';

/**
 * Optional, independent listing criteria. Absent or empty values impose no
 * constraint; present ones are ANDed, `search` ORs across title/brand/tags.
 */
export interface ProductFilterCriteria {
  readonly category?: string;
  readonly brand?: string;
  readonly search?: string;
  readonly minPrice?: number;
  readonly maxPrice?: number;
  readonly ram?: string;
  readonly storage?: string;
  readonly battery?: string;
  readonly camera?: string;
  readonly os?: string;
}

export const PRODUCT_SORT_POLICIES = [
  'popularity',
  'latest',
  'price_asc',
  'price_desc',
] as const;
export type ProductSortPolicy = (typeof PRODUCT_SORT_POLICIES)[number];

export interface PageRequest {
  readonly page?: number;
  readonly limit?: number;
}

export interface PageWindow {
  readonly page: number;
  readonly limit: number;
  readonly skip: number;
}

export interface ProductQueryOptions {
  readonly regexMode: RegexMode;
  readonly defaultLimit: number;
  readonly maxLimit: number;
}

export interface ProductQueryPlan extends PageWindow {
  readonly filter: Filter<Document>;
  /** Absent means natural order. */
  readonly sort?: Record<string, SortDirection>;
}

const SORT_DIRECTIVES: Readonly<
  Record<ProductSortPolicy, Record<string, SortDirection>>
> = {
  popularity: { popularity: -1 },
  latest: { created_at: -1 },
  price_asc: { price: 1 },
  price_desc: { price: -1 },
};

function present(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** HTTP parameter name for a specs field (`os` travels as `os_name`). */
function specParam(field: FilterableSpecField): string {
  return field === 'os' ? 'os_name' : field;
}

/**
 * HTTP names of the parameters that became regex predicates, in the order
 * they are written to the filter. Used to name the culprit when the store
 * rejects a pattern.
 */
export function patternParams(criteria: ProductFilterCriteria): string[] {
  const params: string[] = [];
  if (present(criteria.category)) params.push('category');
  if (present(criteria.brand)) params.push('brand');
  for (const field of FILTERABLE_SPEC_FIELDS) {
    if (present(criteria[field])) params.push(specParam(field));
  }
  if (present(criteria.search)) params.push('search');
  return params;
}

/**
 * Compose the criteria into a single filter document.
 * Each criterion owns a distinct top-level key, so the object's keys are
 * implicitly ANDed by the store. No criteria yields `{}` (match-all).
 */
export function buildProductFilter(
  criteria: ProductFilterCriteria,
  mode: RegexMode,
): Filter<Document> {
  const filter: Filter<Document> = {};

  if (present(criteria.category)) {
    filter.category = exactPredicate(criteria.category, mode);
  }
  if (present(criteria.brand)) {
    filter.brand = exactPredicate(criteria.brand, mode);
  }

  const { minPrice, maxPrice } = criteria;
  if (minPrice !== undefined || maxPrice !== undefined) {
    const range: { $gte?: number; $lte?: number } = {};
    if (minPrice !== undefined) range.$gte = minPrice;
    if (maxPrice !== undefined) range.$lte = maxPrice;
    filter.price = range;
  }

  for (const field of FILTERABLE_SPEC_FIELDS) {
    const value = criteria[field];
    if (present(value)) {
      filter[`specs.${field}`] = containsPredicate(value, mode);
    }
  }

  if (present(criteria.search)) {
    const fragment = containsPredicate(criteria.search, mode);
    filter.$or = [
      { title: { ...fragment } },
      { brand: { ...fragment } },
      { tags: { ...fragment } },
    ];
  }

  return filter;
}

export function resolveSort(
  policy: ProductSortPolicy | undefined,
): Record<string, SortDirection> | undefined {
  return policy ? { ...SORT_DIRECTIVES[policy] } : undefined;
}

/**
 * Page ≤ 0 (or absent) is page 1. Limit falls back to the default and is
 * capped at maxLimit; a non-positive limit is treated as absent.
 */
export function resolvePageWindow(
  req: PageRequest,
  opts: Pick<ProductQueryOptions, 'defaultLimit' | 'maxLimit'>,
): PageWindow {
  const page =
    typeof req.page === 'number' && Number.isFinite(req.page) && req.page >= 1
      ? Math.floor(req.page)
      : 1;
  const requested =
    typeof req.limit === 'number' && Number.isFinite(req.limit) && req.limit >= 1
      ? Math.floor(req.limit)
      : opts.defaultLimit;
  const limit = Math.min(requested, opts.maxLimit);
  const skip = Math.max(0, (page - 1) * limit);
  return { page, limit, skip };
}

export function buildProductQuery(
  criteria: ProductFilterCriteria,
  sort: ProductSortPolicy | undefined,
  pageReq: PageRequest,
  opts: ProductQueryOptions,
): ProductQueryPlan {
  return {
    filter: buildProductFilter(criteria, opts.regexMode),
    sort: resolveSort(sort),
    ...resolvePageWindow(pageReq, opts),
  };
}
