import type { PublicWishlistEntry } from '../../../lib/catalog/public-id';

export type ToggleWishlistResponseDto =
  | { status: 'removed' }
  | { status: 'added'; item: PublicWishlistEntry };
