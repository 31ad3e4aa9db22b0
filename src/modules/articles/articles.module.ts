import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { ArticlesController } from './articles.controller';
import { ArticlesService } from './articles.service';

@Module({
  imports: [MongodbModule],
  controllers: [ArticlesController],
  providers: [ArticlesService],
})
export class ArticlesModule {}
