import { Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  PRODUCT_SORT_POLICIES,
  type ProductSortPolicy,
} from '../query/product-query.builder';
import { toOptionalNumber } from '../../../lib/utils/transform';

/** Highest accepted page; keeps (page - 1) * limit a safe integer. */
export const MAX_PAGE = 10_000_000;

/**
 * Query string of GET /api/products.
 * Values ≤ 0 for `page` are clamped to 1 by the pager.
 */
export class ListProductsQueryDto {
  @IsOptional()
  @IsString()
  public readonly category?: string;

  @IsOptional()
  @IsString()
  public readonly search?: string;

  @IsOptional()
  @IsString()
  public readonly brand?: string;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  public readonly minPrice?: number;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  public readonly maxPrice?: number;

  @IsOptional()
  @IsString()
  public readonly ram?: string;

  @IsOptional()
  @IsString()
  public readonly storage?: string;

  @IsOptional()
  @IsString()
  public readonly battery?: string;

  @IsOptional()
  @IsString()
  public readonly camera?: string;

  @IsOptional()
  @IsString()
  public readonly os_name?: string;

  @IsOptional()
  @IsIn(PRODUCT_SORT_POLICIES)
  public readonly sort?: ProductSortPolicy;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsInt()
  @Max(MAX_PAGE)
  public readonly page?: number;

  @IsOptional()
  @Transform(toOptionalNumber)
  @IsInt()
  @Min(1)
  public readonly limit?: number;
}
