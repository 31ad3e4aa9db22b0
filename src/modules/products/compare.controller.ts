import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ProductsService } from './products.service';
import { CompareProductsRequestDto } from './dto/CompareProducts.request.dto';
import type { PublicProduct } from '../../lib/catalog/public-id';

@Controller('api/compare')
export class CompareController {
  constructor(private readonly svc: ProductsService) {}

  /** Side-by-side products for up to the configured number of ids/slugs. */
  @Post()
  @HttpCode(200)
  async compare(
    @Body() body: CompareProductsRequestDto,
  ): Promise<PublicProduct[]> {
    return this.svc.compare(body.ids);
  }
}
