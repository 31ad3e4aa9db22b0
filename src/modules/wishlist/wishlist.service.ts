import { Injectable, Logger } from '@nestjs/common';
import { ObjectId, type Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  PRODUCTS_COLLECTION,
  WISHLIST_COLLECTION,
  type ProductDocBase,
  type WishlistDocBase,
} from '../../lib/catalog/types';
import {
  toPublicProduct,
  toPublicWishlistEntry,
  type PublicProduct,
} from '../../lib/catalog/public-id';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import type { ToggleWishlistResponseDto } from './dto/ToggleWishlist.response.dto';

@Injectable()
export class WishlistService {
  private readonly logger = new Logger(WishlistService.name);

  constructor(private readonly mongo: MongodbService) {}

  /**
   * Products on a user's wishlist, in the order they were added.
   * Entries whose product no longer exists are skipped.
   */
  public async get(userId: string): Promise<PublicProduct[]> {
    const entries = await this.entries();
    const products = await this.mongo.getCollection<ProductDocBase>(
      PRODUCTS_COLLECTION,
    );
    try {
      const items = await entries
        .find({ user_id: new ObjectId(userId) })
        .toArray();
      if (items.length === 0) return [];

      const docs = await products
        .find({ _id: { $in: items.map((i) => i.product_id) } })
        .toArray();
      const byId = new Map(docs.map((d) => [d._id.toHexString(), d]));

      const out: PublicProduct[] = [];
      for (const item of items) {
        const doc = byId.get(item.product_id.toHexString());
        if (doc) out.push(toPublicProduct(doc));
      }
      return out;
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'wishlist.get',
        collection: WISHLIST_COLLECTION,
        argsPreview: { userId },
      });
    }
  }

  /** Remove the (user, product) entry if present, otherwise add it. */
  public async toggle(
    userId: string,
    productId: string,
  ): Promise<ToggleWishlistResponseDto> {
    const col = await this.entries();
    const key = {
      user_id: new ObjectId(userId),
      product_id: new ObjectId(productId),
    };
    try {
      const existing = await col.findOne(key);
      if (existing) {
        await col.deleteOne({ _id: existing._id });
        this.logger.debug(`Removed ${productId} from wishlist of ${userId}`);
        return { status: 'removed' };
      }

      const now = new Date();
      const doc: WishlistDocBase = { ...key, created_at: now, updated_at: now };
      const { insertedId } = await col.insertOne(doc);
      this.logger.debug(`Added ${productId} to wishlist of ${userId}`);
      return {
        status: 'added',
        item: toPublicWishlistEntry({ ...doc, _id: insertedId }),
      };
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'wishlist.toggle',
        collection: WISHLIST_COLLECTION,
        argsPreview: { userId, productId },
      });
    }
  }

  private async entries(): Promise<Collection<WishlistDocBase>> {
    return this.mongo.getCollection<WishlistDocBase>(WISHLIST_COLLECTION);
  }
}
