import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [MongodbModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
