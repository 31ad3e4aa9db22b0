import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class ImportBrandDto {
  @IsString()
  public readonly name!: string;

  /** Derived from `name` when absent. */
  @IsOptional()
  @IsString()
  public readonly slug?: string;

  @IsOptional()
  @IsString()
  public readonly logo_url?: string;
}

export class ImportPriceSourceDto {
  @IsString()
  public readonly merchant!: string;

  @IsOptional()
  @IsString()
  public readonly url?: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  public readonly price!: number;
}

export class ImportProductSpecsDto {
  @IsOptional() @IsString() public readonly display?: string;
  @IsOptional() @IsString() public readonly camera?: string;
  @IsOptional() @IsString() public readonly performance?: string;
  @IsOptional() @IsString() public readonly battery?: string;
  @IsOptional() @IsString() public readonly storage?: string;
  @IsOptional() @IsString() public readonly ram?: string;
  @IsOptional() @IsString() public readonly os?: string;
  @IsOptional() @IsString() public readonly chipset?: string;
  @IsOptional() @IsString() public readonly dimensions?: string;
  @IsOptional() @IsString() public readonly weight?: string;
  @IsOptional() @IsString() public readonly connectivity?: string;

  @IsOptional()
  @IsObject()
  public readonly extras?: Record<string, unknown>;
}

export class ImportProductDto {
  @IsString()
  public readonly title!: string;

  /** Derived from `title` when absent. */
  @IsOptional()
  @IsString()
  public readonly slug?: string;

  @IsString()
  public readonly category!: string;

  @IsString()
  public readonly brand!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public readonly images?: string[];

  @IsOptional()
  @IsString()
  public readonly thumbnail?: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  public readonly price!: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImportPriceSourceDto)
  public readonly price_sources?: ImportPriceSourceDto[];

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(5)
  public readonly rating?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  public readonly popularity?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => ImportProductSpecsDto)
  public readonly specs?: ImportProductSpecsDto;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public readonly tags?: string[];
}

export class ImportArticleDto {
  @IsString()
  public readonly title!: string;

  /** Derived from `title` when absent. */
  @IsOptional()
  @IsString()
  public readonly slug?: string;

  @IsOptional()
  @IsString()
  public readonly cover_image?: string;

  @IsOptional()
  @IsString()
  public readonly excerpt?: string;

  @IsString()
  public readonly content!: string;

  @IsString()
  public readonly author!: string;

  /** news | review | guide; defaults to news. */
  @IsOptional()
  @IsString()
  public readonly category?: string;

  @IsOptional()
  @IsString()
  public readonly published_at?: string;
}

/** Body of POST /api/admin/import. Every list is optional. */
export class ImportCatalogRequestDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImportProductDto)
  public readonly products?: ImportProductDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImportArticleDto)
  public readonly articles?: ImportArticleDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImportBrandDto)
  public readonly brands?: ImportBrandDto[];
}
