import { Injectable, Logger } from '@nestjs/common';
import { MongodbService } from '../mongodb/mongodb.service';
import { USERS_COLLECTION, type UserDocBase } from '../../lib/catalog/types';
import { toPublicUser, type PublicUser } from '../../lib/catalog/public-id';
import { MongoActionError } from '../../lib/errors/MongoActionError';

export const DEFAULT_USER_NAME = 'Guest';

/**
 * Demo login: no credentials are checked. The e-mail identifies the user,
 * who is created on first sight.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(private readonly mongo: MongodbService) {}

  public async login(email: string, name?: string): Promise<PublicUser> {
    const col = await this.mongo.getCollection<UserDocBase>(USERS_COLLECTION);
    try {
      const existing = await col.findOne({ email });
      if (existing) return toPublicUser(existing);

      const now = new Date();
      const doc: UserDocBase = {
        email,
        name: name && name.length > 0 ? name : DEFAULT_USER_NAME,
        provider: 'local',
        created_at: now,
        updated_at: now,
      };
      const { insertedId } = await col.insertOne(doc);
      this.logger.log(`Created user ${insertedId.toHexString()}`);
      return toPublicUser({ ...doc, _id: insertedId });
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'auth.login',
        collection: USERS_COLLECTION,
      });
    }
  }
}
