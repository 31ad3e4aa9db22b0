import { AppError } from './AppError';

/**
 * Catalog domain errors.
 * Controllers map these to HTTP responses; anything else surfaces as 500.
 */

export class ProductNotFoundError extends AppError {
  constructor(readonly slug: string) {
    super('Product not found', 'CATALOG_PRODUCT_NOT_FOUND');
  }
}

/** A query parameter passed DTO validation but cannot be turned into a predicate. */
export class InvalidQueryError extends AppError {
  constructor(
    readonly param: string,
    reason: string,
  ) {
    super(`Invalid '${param}': ${reason}`, 'CATALOG_INVALID_QUERY');
  }
}
