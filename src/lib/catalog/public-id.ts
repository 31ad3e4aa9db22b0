import { ObjectId } from 'mongodb';
import type {
  ArticleDoc,
  BrandDoc,
  ProductDoc,
  UserDoc,
  WishlistDoc,
} from './types';

/** Keys of T whose values are ObjectIds. */
export type ObjectIdKeys<T> = {
  [K in keyof T]-?: T[K] extends ObjectId ? K : never;
}[keyof T] &
  keyof T;

/**
 * Public shape of a stored record: `_id` becomes a hex `id`,
 * and each declared reference field becomes a hex string.
 */
export type PublicRecord<
  T extends { _id: ObjectId },
  R extends ObjectIdKeys<T> = never,
> = { id: string } & Omit<T, '_id' | R> & { [K in R]: string };

/**
 * Identifier-bearing fields per collection, besides `_id`.
 * Only these are converted; nothing else is probed.
 */
export const WISHLIST_ID_REFS = ['user_id', 'product_id'] as const;

export function toPublicRecord<
  T extends { _id: ObjectId },
  R extends ObjectIdKeys<T> = never,
>(doc: T, refs: ReadonlyArray<R> = []): PublicRecord<T, R> {
  const out: Record<string, unknown> = { id: doc._id.toHexString() };
  for (const [k, v] of Object.entries(doc)) {
    if (k === '_id') continue;
    out[k] = v;
  }
  for (const ref of refs) {
    const value: unknown = doc[ref];
    if (value instanceof ObjectId) out[String(ref)] = value.toHexString();
  }
  return out as PublicRecord<T, R>;
}

export type PublicProduct = PublicRecord<ProductDoc>;
export type PublicBrand = PublicRecord<BrandDoc>;
export type PublicArticle = PublicRecord<ArticleDoc>;
export type PublicUser = PublicRecord<UserDoc>;
export type PublicWishlistEntry = PublicRecord<
  WishlistDoc,
  (typeof WISHLIST_ID_REFS)[number]
>;

export const toPublicProduct = (doc: ProductDoc): PublicProduct =>
  toPublicRecord(doc);
export const toPublicBrand = (doc: BrandDoc): PublicBrand =>
  toPublicRecord(doc);
export const toPublicArticle = (doc: ArticleDoc): PublicArticle =>
  toPublicRecord(doc);
export const toPublicUser = (doc: UserDoc): PublicUser => toPublicRecord(doc);
export const toPublicWishlistEntry = (doc: WishlistDoc): PublicWishlistEntry =>
  toPublicRecord(doc, WISHLIST_ID_REFS);
