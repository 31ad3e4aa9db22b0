import type { PublicProduct } from '../../../lib/catalog/public-id';

export interface ListProductsResponseDto {
  items: PublicProduct[];
  page: number;
  limit: number;
  /** Matches for the filter, independent of page/limit. */
  total: number;
}
