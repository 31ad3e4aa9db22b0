import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { BrandsController } from './brands.controller';
import { BrandsService } from './brands.service';

@Module({
  imports: [MongodbModule],
  controllers: [BrandsController],
  providers: [BrandsService],
})
export class BrandsModule {}
