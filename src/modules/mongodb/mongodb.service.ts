import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
} from '@nestjs/common';
import type { Collection, Db, Document } from 'mongodb';
import { LazyMongoClient } from './internal/mongodb.client';
import {
  maskMongoUri,
  mongoConfig,
  type MongoConfig,
} from '../../infra/mongo/mongo.config';
import { isNonEmptyString } from '../../lib/utils/strings';
import { MongoActionError } from '../../lib/errors/MongoActionError';

/**
 * Store handle for the catalog database.
 * Constructed once from the `mongo` config; the client connects on first use
 * and is closed when the application shuts down.
 */
@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);
  private readonly lazy: LazyMongoClient;

  public constructor(
    @Inject(mongoConfig.KEY) private readonly cfg: MongoConfig,
  ) {
    this.lazy = new LazyMongoClient(cfg.uri);
  }

  public get dbName(): string {
    return this.cfg.dbName;
  }

  /** Connected native driver Db handle for the configured database. */
  public async getDb(): Promise<Db> {
    try {
      const wasConnected = this.lazy.isConnected();
      const client = await this.lazy.getClient();
      if (!wasConnected) {
        this.logger.log(`Connected to ${maskMongoUri(this.cfg.uri)}`);
      }
      return client.db(this.cfg.dbName);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'getDb',
        dbName: this.cfg.dbName,
      });
    }
  }

  /**
   * Native driver Collection<T> for direct use by callers.
   * No schema enforcement here; DTOs validate at the HTTP boundary.
   */
  public async getCollection<T extends Document = Document>(
    collection: string,
  ): Promise<Collection<T>> {
    if (!isNonEmptyString(collection)) {
      throw new MongoActionError('Collection name must be a non-empty string', {
        operation: 'getCollection',
        dbName: this.cfg.dbName,
        argsPreview: { collection: String(collection) },
      });
    }
    const db = await this.getDb();
    return db.collection<T>(collection);
  }

  public async listCollectionNames(): Promise<string[]> {
    const db = await this.getDb();
    try {
      const infos = await db.listCollections({}, { nameOnly: true }).toArray();
      return infos.map((c) => c.name);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'listCollections',
        dbName: this.cfg.dbName,
      });
    }
  }

  public async onModuleDestroy(): Promise<void> {
    if (!this.lazy.isConnected()) return;
    await this.lazy.close();
    this.logger.log('Mongo client closed.');
  }
}
