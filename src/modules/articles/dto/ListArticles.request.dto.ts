import { Transform } from 'class-transformer';
import { IsInt, IsOptional, IsString, Min } from 'class-validator';
import { toOptionalNumber } from '../../../lib/utils/transform';

/** Query string of GET /api/articles. */
export class ListArticlesQueryDto {
  @IsOptional()
  @IsString()
  public readonly category?: string;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsInt()
  @Min(1)
  public readonly limit?: number;
}
