import { Inject, Injectable } from '@nestjs/common';
import type { Document, Filter } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  catalogConfig,
  type CatalogConfig,
} from '../../config/catalog.config';
import {
  ARTICLES_COLLECTION,
  type ArticleDocBase,
} from '../../lib/catalog/types';
import {
  toPublicArticle,
  type PublicArticle,
} from '../../lib/catalog/public-id';
import {
  exactPredicate,
  isInvalidPatternError,
} from '../../lib/catalog/match';
import { InvalidQueryError } from '../../lib/errors/CatalogError';
import { MongoActionError } from '../../lib/errors/MongoActionError';

export interface ListArticlesOptions {
  readonly category?: string;
  readonly limit?: number;
}

@Injectable()
export class ArticlesService {
  constructor(
    private readonly mongo: MongodbService,
    @Inject(catalogConfig.KEY) private readonly cfg: CatalogConfig,
  ) {}

  /**
   * Newest articles first, optionally restricted to one category
   * (case-insensitive, whole value).
   */
  public async list(opts: ListArticlesOptions = {}): Promise<PublicArticle[]> {
    const filter: Filter<Document> = {};
    if (opts.category) {
      filter.category = exactPredicate(opts.category, this.cfg.regexMode);
    }
    const limit = Math.min(
      opts.limit !== undefined && opts.limit >= 1
        ? Math.floor(opts.limit)
        : this.cfg.defaultLimit,
      this.cfg.maxLimit,
    );

    const col = await this.mongo.getCollection<ArticleDocBase>(
      ARTICLES_COLLECTION,
    );
    try {
      const docs = await col
        .find(filter)
        .sort({ created_at: -1 })
        .limit(limit)
        .toArray();
      return docs.map(toPublicArticle);
    } catch (err) {
      if (isInvalidPatternError(err)) {
        throw new InvalidQueryError('category', 'not a valid pattern');
      }
      throw MongoActionError.wrap(err, {
        operation: 'articles.list',
        collection: ARTICLES_COLLECTION,
        argsPreview: { category: opts.category, limit },
      });
    }
  }
}
