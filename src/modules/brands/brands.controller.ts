import { Controller, Get } from '@nestjs/common';
import { BrandsService } from './brands.service';
import type { PublicBrand } from '../../lib/catalog/public-id';

@Controller('api/brands')
export class BrandsController {
  constructor(private readonly brands: BrandsService) {}

  @Get()
  async list(): Promise<PublicBrand[]> {
    return this.brands.list();
  }
}
