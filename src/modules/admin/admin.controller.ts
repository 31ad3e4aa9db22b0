import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { AdminService } from './admin.service';
import { ImportCatalogRequestDto } from './dto/Import.request.dto';
import type {
  ImportCatalogResponseDto,
  SeedCatalogResponseDto,
} from './dto/Admin.response.dto';

@Controller('api/admin')
export class AdminController {
  constructor(private readonly admin: AdminService) {}

  @Post('import')
  @HttpCode(200)
  async import(
    @Body() body: ImportCatalogRequestDto,
  ): Promise<ImportCatalogResponseDto> {
    return this.admin.import(body);
  }

  @Post('seed')
  @HttpCode(200)
  async seed(): Promise<SeedCatalogResponseDto> {
    return this.admin.seed();
  }
}
