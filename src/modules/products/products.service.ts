import { Inject, Injectable } from '@nestjs/common';
import { ObjectId, type Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  catalogConfig,
  type CatalogConfig,
} from '../../config/catalog.config';
import {
  PRODUCTS_COLLECTION,
  type ProductDocBase,
} from '../../lib/catalog/types';
import {
  toPublicProduct,
  type PublicProduct,
} from '../../lib/catalog/public-id';
import {
  InvalidQueryError,
  ProductNotFoundError,
} from '../../lib/errors/CatalogError';
import { isInvalidPatternError } from '../../lib/catalog/match';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { isHex24 } from '../../lib/utils/strings';
import {
  buildProductQuery,
  patternParams,
  type PageRequest,
  type ProductFilterCriteria,
  type ProductSortPolicy,
} from './query/product-query.builder';
import type { ListProductsResponseDto } from './dto/ListProducts.response.dto';

@Injectable()
export class ProductsService {
  constructor(
    private readonly mongo: MongodbService,
    @Inject(catalogConfig.KEY) private readonly cfg: CatalogConfig,
  ) {}

  /**
   * One filtered, sorted page of products plus the total match count.
   * Runs exactly one find and one count against the same filter.
   */
  public async list(
    criteria: ProductFilterCriteria,
    sort: ProductSortPolicy | undefined,
    pageReq: PageRequest,
  ): Promise<ListProductsResponseDto> {
    const plan = buildProductQuery(criteria, sort, pageReq, this.cfg);
    const col = await this.getCollection();

    try {
      let cursor = col.find(plan.filter);
      if (plan.sort) cursor = cursor.sort(plan.sort);
      cursor = cursor.skip(plan.skip).limit(plan.limit);

      const [docs, total] = await Promise.all([
        cursor.toArray(),
        col.countDocuments(plan.filter),
      ]);

      return {
        items: docs.map(toPublicProduct),
        page: plan.page,
        limit: plan.limit,
        total,
      };
    } catch (err) {
      if (isInvalidPatternError(err)) {
        const params = patternParams(criteria);
        throw new InvalidQueryError(
          params.length > 0 ? params.join(', ') : 'query',
          'not a valid pattern',
        );
      }
      throw MongoActionError.wrap(err, {
        operation: 'products.list',
        collection: PRODUCTS_COLLECTION,
        argsPreview: { page: plan.page, limit: plan.limit, sort },
      });
    }
  }

  public async getBySlug(slug: string): Promise<PublicProduct> {
    const col = await this.getCollection();
    const doc = await col.findOne({ slug }).catch((err: unknown) => {
      throw MongoActionError.wrap(err, {
        operation: 'products.getBySlug',
        collection: PRODUCTS_COLLECTION,
        argsPreview: { slug },
      });
    });
    if (!doc) throw new ProductNotFoundError(slug);
    return toPublicProduct(doc);
  }

  /**
   * Resolve up to `compareMax` ids or slugs to products, in request order.
   * A 24-hex entry is an id; anything else is looked up as a slug and
   * skipped when unknown. Duplicates collapse to the first occurrence.
   */
  public async compare(ids: ReadonlyArray<string>): Promise<PublicProduct[]> {
    const wanted = ids.slice(0, this.cfg.compareMax);
    const col = await this.getCollection();

    try {
      const resolved: ObjectId[] = [];
      for (const raw of wanted) {
        if (isHex24(raw)) {
          resolved.push(new ObjectId(raw));
          continue;
        }
        const bySlug = await col.findOne(
          { slug: raw },
          { projection: { _id: 1 } },
        );
        if (bySlug) resolved.push(bySlug._id);
      }
      if (resolved.length === 0) return [];

      const docs = await col.find({ _id: { $in: resolved } }).toArray();
      const byId = new Map(docs.map((d) => [d._id.toHexString(), d]));

      const out: PublicProduct[] = [];
      const seen = new Set<string>();
      for (const id of resolved) {
        const hex = id.toHexString();
        const doc = byId.get(hex);
        if (!doc || seen.has(hex)) continue;
        seen.add(hex);
        out.push(toPublicProduct(doc));
      }
      return out;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'products.compare',
        collection: PRODUCTS_COLLECTION,
        argsPreview: { count: wanted.length },
      });
    }
  }

  private async getCollection(): Promise<Collection<ProductDocBase>> {
    return this.mongo.getCollection<ProductDocBase>(PRODUCTS_COLLECTION);
  }
}
