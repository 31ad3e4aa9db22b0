import { IsMongoId } from 'class-validator';

/** Query string of GET /api/wishlist. */
export class GetWishlistQueryDto {
  @IsMongoId()
  public readonly user_id!: string;
}

export class ToggleWishlistRequestDto {
  @IsMongoId()
  public readonly user_id!: string;

  @IsMongoId()
  public readonly product_id!: string;
}
