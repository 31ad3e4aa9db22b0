// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { catalogConfig } from './config/catalog.config';
import { mongoConfig } from './infra/mongo/mongo.config';
import { MongodbModule } from './modules/mongodb/mongodb.module';
import { HealthModule } from './modules/health/health.module';
import { BrandsModule } from './modules/brands/brands.module';
import { ProductsModule } from './modules/products/products.module';
import { ArticlesModule } from './modules/articles/articles.module';
import { AuthModule } from './modules/auth/auth.module';
import { WishlistModule } from './modules/wishlist/wishlist.module';
import { AdminModule } from './modules/admin/admin.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [mongoConfig, catalogConfig] }),
    MongodbModule,
    HealthModule,
    BrandsModule,
    ProductsModule,
    ArticlesModule,
    AuthModule,
    WishlistModule,
    AdminModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
