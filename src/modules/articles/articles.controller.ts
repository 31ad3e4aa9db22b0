import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { ArticlesService } from './articles.service';
import { ListArticlesQueryDto } from './dto/ListArticles.request.dto';
import type { PublicArticle } from '../../lib/catalog/public-id';
import { InvalidQueryError } from '../../lib/errors/CatalogError';

@Controller('api/articles')
export class ArticlesController {
  constructor(private readonly svc: ArticlesService) {}

  private mapDomainError(err: unknown): never {
    if (err instanceof InvalidQueryError) {
      throw new BadRequestException(err.message);
    }
    throw err;
  }

  @Get()
  async list(@Query() q: ListArticlesQueryDto): Promise<PublicArticle[]> {
    try {
      return await this.svc.list({ category: q.category, limit: q.limit });
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
