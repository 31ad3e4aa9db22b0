import { Injectable, Logger } from '@nestjs/common';
import type { Document } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  ARTICLES_COLLECTION,
  BRANDS_COLLECTION,
  PRODUCTS_COLLECTION,
  type Timestamps,
} from '../../lib/catalog/types';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import type { ImportCatalogRequestDto } from './dto/Import.request.dto';
import type {
  ImportCatalogResponseDto,
  SeedCatalogResponseDto,
} from './dto/Admin.response.dto';
import {
  normalizeArticle,
  normalizeBrand,
  normalizeProduct,
} from './internal/catalog.normalize';
import {
  SEED_ARTICLES,
  SEED_BRANDS,
  SEED_PRODUCTS,
} from './internal/catalog.seeds';

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(private readonly mongo: MongodbService) {}

  /**
   * Bulk insert. Brands go first, then products, then articles; each record
   * is stamped and inserted one at a time, so a failure leaves earlier
   * records in place.
   */
  public async import(
    body: ImportCatalogRequestDto,
  ): Promise<ImportCatalogResponseDto> {
    const brands = (body.brands ?? []).map(normalizeBrand);
    const products = (body.products ?? []).map(normalizeProduct);
    const articles = (body.articles ?? []).map(normalizeArticle);

    const inserted = {
      brands: await this.insertEach(BRANDS_COLLECTION, brands),
      products: await this.insertEach(PRODUCTS_COLLECTION, products),
      articles: await this.insertEach(ARTICLES_COLLECTION, articles),
    };
    this.logger.log(
      `Imported ${inserted.products} products, ${inserted.articles} articles, ${inserted.brands} brands`,
    );
    return { inserted };
  }

  /** Insert the sample catalog unless products already exist. */
  public async seed(): Promise<SeedCatalogResponseDto> {
    const products = await this.mongo.getCollection(PRODUCTS_COLLECTION);
    const count = await products.countDocuments({}).catch((err: unknown) => {
      throw MongoActionError.wrap(err, {
        operation: 'admin.seed',
        collection: PRODUCTS_COLLECTION,
      });
    });
    if (count > 0) {
      this.logger.log('Seed skipped: catalog already has products');
      return { status: 'exists' };
    }

    await this.insertEach(BRANDS_COLLECTION, SEED_BRANDS);
    await this.insertEach(PRODUCTS_COLLECTION, SEED_PRODUCTS);
    await this.insertEach(ARTICLES_COLLECTION, SEED_ARTICLES);
    this.logger.log(
      `Seeded ${SEED_BRANDS.length} brands, ${SEED_PRODUCTS.length} products, ${SEED_ARTICLES.length} articles`,
    );
    return { status: 'seeded' };
  }

  private async insertEach(
    collection: string,
    records: ReadonlyArray<object>,
  ): Promise<number> {
    if (records.length === 0) return 0;
    let count = 0;
    try {
      const col = await this.mongo.getCollection<Document>(collection);
      for (const record of records) {
        const now = new Date();
        const stamps: Timestamps = { created_at: now, updated_at: now };
        await col.insertOne({ ...record, ...stamps });
        count += 1;
      }
      return count;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'admin.insert',
        collection,
        argsPreview: { inserted: count, total: records.length },
      });
    }
  }
}
