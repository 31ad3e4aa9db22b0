import { Module } from '@nestjs/common';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module.
 * - Provides the store handle every catalog module reads and writes through.
 * - No controllers (not exposed over HTTP).
 */
@Module({
  providers: [MongodbService],
  exports: [MongodbService],
})
export class MongodbModule {}
