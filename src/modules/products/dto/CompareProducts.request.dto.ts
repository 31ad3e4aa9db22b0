import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

/** Each entry is a product id (24 hex) or a slug. */
export class CompareProductsRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  public readonly ids!: string[];
}
