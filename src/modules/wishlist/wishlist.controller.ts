import { Body, Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { WishlistService } from './wishlist.service';
import {
  GetWishlistQueryDto,
  ToggleWishlistRequestDto,
} from './dto/Wishlist.request.dto';
import type { ToggleWishlistResponseDto } from './dto/ToggleWishlist.response.dto';
import type { PublicProduct } from '../../lib/catalog/public-id';

@Controller('api/wishlist')
export class WishlistController {
  constructor(private readonly wishlist: WishlistService) {}

  @Get()
  async get(@Query() q: GetWishlistQueryDto): Promise<PublicProduct[]> {
    return this.wishlist.get(q.user_id);
  }

  @Post('toggle')
  @HttpCode(200)
  async toggle(
    @Body() body: ToggleWishlistRequestDto,
  ): Promise<ToggleWishlistResponseDto> {
    return this.wishlist.toggle(body.user_id, body.product_id);
  }
}
