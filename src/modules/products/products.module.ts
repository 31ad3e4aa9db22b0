import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { ProductsController } from './products.controller';
import { CompareController } from './compare.controller';
import { ProductsService } from './products.service';

@Module({
  imports: [MongodbModule],
  controllers: [ProductsController, CompareController],
  providers: [ProductsService],
  exports: [ProductsService],
})
export class ProductsModule {}
