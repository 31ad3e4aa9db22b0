import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { WishlistController } from './wishlist.controller';
import { WishlistService } from './wishlist.service';

@Module({
  imports: [MongodbModule],
  controllers: [WishlistController],
  providers: [WishlistService],
})
export class WishlistModule {}
