export interface ImportCountsDto {
  products: number;
  articles: number;
  brands: number;
}

export interface ImportCatalogResponseDto {
  inserted: ImportCountsDto;
}

export interface SeedCatalogResponseDto {
  status: 'seeded' | 'exists';
}
