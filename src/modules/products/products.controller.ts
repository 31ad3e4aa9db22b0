import {
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import { ProductsService } from './products.service';
import { ListProductsQueryDto } from './dto/ListProducts.request.dto';
import type { ListProductsResponseDto } from './dto/ListProducts.response.dto';
import type { PublicProduct } from '../../lib/catalog/public-id';
import {
  InvalidQueryError,
  ProductNotFoundError,
} from '../../lib/errors/CatalogError';

@Controller('api/products')
export class ProductsController {
  constructor(private readonly svc: ProductsService) {}

  private mapDomainError(err: unknown): never {
    if (err instanceof ProductNotFoundError) {
      throw new NotFoundException(err.message);
    }
    if (err instanceof InvalidQueryError) {
      throw new BadRequestException(err.message);
    }
    throw err;
  }

  /** Filtered, sorted, paginated product listing. */
  @Get()
  async list(
    @Query() q: ListProductsQueryDto,
  ): Promise<ListProductsResponseDto> {
    try {
      return await this.svc.list(
        {
          category: q.category,
          brand: q.brand,
          search: q.search,
          minPrice: q.minPrice,
          maxPrice: q.maxPrice,
          ram: q.ram,
          storage: q.storage,
          battery: q.battery,
          camera: q.camera,
          os: q.os_name,
        },
        q.sort,
        { page: q.page, limit: q.limit },
      );
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':slug')
  async getBySlug(@Param('slug') slug: string): Promise<PublicProduct> {
    try {
      return await this.svc.getBySlug(slug);
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
