import type {
  ArticleInput,
  BrandInput,
  PriceSource,
  ProductInput,
  ProductSpecs,
} from '../../../lib/catalog/types';
import { isNonEmptyString, slugify } from '../../../lib/utils/strings';
import type {
  ImportArticleDto,
  ImportBrandDto,
  ImportPriceSourceDto,
  ImportProductDto,
  ImportProductSpecsDto,
} from '../dto/Import.request.dto';

export const DEFAULT_ARTICLE_CATEGORY = 'news';

// Optional fields left undefined are dropped by the client (ignoreUndefined).

function slugOr(slug: string | undefined, source: string): string {
  return isNonEmptyString(slug) ? slug : slugify(source);
}

export function normalizeBrand(dto: ImportBrandDto): BrandInput {
  return {
    name: dto.name,
    slug: slugOr(dto.slug, dto.name),
    logo_url: dto.logo_url,
  };
}

function normalizePriceSource(dto: ImportPriceSourceDto): PriceSource {
  return { merchant: dto.merchant, url: dto.url, price: dto.price };
}

function normalizeSpecs(dto: ImportProductSpecsDto | undefined): ProductSpecs {
  if (!dto) return {};
  return {
    display: dto.display,
    camera: dto.camera,
    performance: dto.performance,
    battery: dto.battery,
    storage: dto.storage,
    ram: dto.ram,
    os: dto.os,
    chipset: dto.chipset,
    dimensions: dto.dimensions,
    weight: dto.weight,
    connectivity: dto.connectivity,
    extras: dto.extras,
  };
}

export function normalizeProduct(dto: ImportProductDto): ProductInput {
  return {
    title: dto.title,
    slug: slugOr(dto.slug, dto.title),
    category: dto.category,
    brand: dto.brand,
    images: dto.images ?? [],
    thumbnail: dto.thumbnail,
    price: dto.price,
    price_sources: (dto.price_sources ?? []).map(normalizePriceSource),
    rating: dto.rating,
    popularity: dto.popularity ?? 0,
    specs: normalizeSpecs(dto.specs),
    tags: dto.tags ?? [],
  };
}

export function normalizeArticle(dto: ImportArticleDto): ArticleInput {
  return {
    title: dto.title,
    slug: slugOr(dto.slug, dto.title),
    cover_image: dto.cover_image,
    excerpt: dto.excerpt,
    content: dto.content,
    author: dto.author,
    category: dto.category ?? DEFAULT_ARTICLE_CATEGORY,
    published_at: dto.published_at,
  };
}
