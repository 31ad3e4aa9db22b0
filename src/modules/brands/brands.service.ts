import { Injectable } from '@nestjs/common';
import { MongodbService } from '../mongodb/mongodb.service';
import { BRANDS_COLLECTION, type BrandDocBase } from '../../lib/catalog/types';
import { toPublicBrand, type PublicBrand } from '../../lib/catalog/public-id';
import { MongoActionError } from '../../lib/errors/MongoActionError';

@Injectable()
export class BrandsService {
  constructor(private readonly mongo: MongodbService) {}

  /** Every brand, natural order. */
  public async list(): Promise<PublicBrand[]> {
    const col = await this.mongo.getCollection<BrandDocBase>(BRANDS_COLLECTION);
    try {
      const docs = await col.find({}).toArray();
      return docs.map(toPublicBrand);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'brands.list',
        collection: BRANDS_COLLECTION,
      });
    }
  }
}
