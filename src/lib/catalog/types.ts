import type { ObjectId, WithId } from 'mongodb';

/** Collection names. */
export const PRODUCTS_COLLECTION = 'product' as const;
export const BRANDS_COLLECTION = 'brand' as const;
export const ARTICLES_COLLECTION = 'article' as const;
export const USERS_COLLECTION = 'user' as const;
export const WISHLIST_COLLECTION = 'wishlist' as const;

/** Stamped on every insert. */
export interface Timestamps {
  created_at: Date;
  updated_at: Date;
}

/* ---------------------------
   Brand
   --------------------------- */

export interface BrandInput {
  name: string;
  slug: string;
  logo_url?: string;
}
export type BrandDocBase = BrandInput & Timestamps;
export type BrandDoc = WithId<BrandDocBase>;

/* ---------------------------
   Product
   --------------------------- */

export interface PriceSource {
  merchant: string;
  url?: string;
  price: number;
}

export interface ProductSpecs {
  display?: string;
  camera?: string;
  performance?: string;
  battery?: string;
  storage?: string;
  ram?: string;
  os?: string;
  chipset?: string;
  dimensions?: string;
  weight?: string;
  connectivity?: string;
  extras?: Record<string, unknown>;
}

/** `specs` sub-fields that the listing endpoint filters on. */
export const FILTERABLE_SPEC_FIELDS = [
  'ram',
  'storage',
  'battery',
  'camera',
  'os',
] as const;
export type FilterableSpecField = (typeof FILTERABLE_SPEC_FIELDS)[number];

export interface ProductInput {
  title: string;
  slug: string;
  /** mobile | laptop | tablet | watch | accessory */
  category: string;
  brand: string;
  images: string[];
  thumbnail?: string;
  price: number;
  price_sources: PriceSource[];
  rating?: number;
  popularity: number;
  specs: ProductSpecs;
  tags: string[];
}
export type ProductDocBase = ProductInput & Timestamps;
export type ProductDoc = WithId<ProductDocBase>;

/* ---------------------------
   Article
   --------------------------- */

export interface ArticleInput {
  title: string;
  slug: string;
  cover_image?: string;
  excerpt?: string;
  content: string;
  author: string;
  /** news | review | guide */
  category: string;
  published_at?: string;
}
export type ArticleDocBase = ArticleInput & Timestamps;
export type ArticleDoc = WithId<ArticleDocBase>;

/* ---------------------------
   User (demo login)
   --------------------------- */

export interface UserDocBase extends Timestamps {
  name?: string;
  email: string;
  password?: string;
  /** local | google */
  provider: string;
  avatar_url?: string;
}
export type UserDoc = WithId<UserDocBase>;

/* ---------------------------
   Wishlist
   --------------------------- */

export interface WishlistDocBase extends Timestamps {
  user_id: ObjectId;
  product_id: ObjectId;
}
export type WishlistDoc = WithId<WishlistDocBase>;
