import type {
  ArticleInput,
  BrandInput,
  ProductInput,
} from '../../../lib/catalog/types';

/**
 * Sample catalog inserted by POST /api/admin/seed when the product
 * collection is empty.
 */

export const SEED_BRANDS: ReadonlyArray<BrandInput> = [
  { name: 'Apple', slug: 'apple', logo_url: 'https://logo.example.com/apple.png' },
  { name: 'Samsung', slug: 'samsung', logo_url: 'https://logo.example.com/samsung.png' },
  { name: 'OnePlus', slug: 'oneplus', logo_url: 'https://logo.example.com/oneplus.png' },
];

export const SEED_PRODUCTS: ReadonlyArray<ProductInput> = [
  {
    title: 'iPhone 15 Pro',
    slug: 'iphone-15-pro',
    category: 'mobile',
    brand: 'Apple',
    images: [
      'https://img.example.com/iphone-15-pro-1.jpg',
      'https://img.example.com/iphone-15-pro-2.jpg',
    ],
    thumbnail: 'https://img.example.com/iphone-15-pro-1.jpg',
    price: 999,
    price_sources: [
      { merchant: 'Amazon', url: '#', price: 999 },
      { merchant: 'Flipkart', url: '#', price: 989 },
    ],
    rating: 4.8,
    popularity: 100,
    specs: {
      display: '6.1 OLED 120Hz',
      camera: '48MP + 12MP',
      performance: 'A17 Pro',
      battery: '3274 mAh',
      storage: '128GB',
      ram: '8GB',
      os: 'iOS 17',
    },
    tags: ['flagship', 'ios', 'premium'],
  },
  {
    title: 'Samsung Galaxy S23',
    slug: 'galaxy-s23',
    category: 'mobile',
    brand: 'Samsung',
    images: ['https://img.example.com/galaxy-s23-1.jpg'],
    thumbnail: 'https://img.example.com/galaxy-s23-1.jpg',
    price: 799,
    price_sources: [{ merchant: 'Amazon', url: '#', price: 779 }],
    rating: 4.6,
    popularity: 90,
    specs: {
      display: '6.1 AMOLED 120Hz',
      camera: '50MP + 10MP + 12MP',
      performance: 'Snapdragon 8 Gen 2',
      battery: '3900 mAh',
      storage: '256GB',
      ram: '8GB',
      os: 'Android 13',
    },
    tags: ['android', 'flagship'],
  },
  {
    title: 'OnePlus 11',
    slug: 'oneplus-11',
    category: 'mobile',
    brand: 'OnePlus',
    images: ['https://img.example.com/oneplus-11-1.jpg'],
    thumbnail: 'https://img.example.com/oneplus-11-1.jpg',
    price: 699,
    price_sources: [{ merchant: 'Amazon', url: '#', price: 679 }],
    rating: 4.5,
    popularity: 80,
    specs: {
      display: '6.7 AMOLED 120Hz',
      camera: '50MP + 48MP + 32MP',
      performance: 'Snapdragon 8 Gen 2',
      battery: '5000 mAh',
      storage: '256GB',
      ram: '12GB',
      os: 'Android 13',
    },
    tags: ['value', 'android'],
  },
];

export const SEED_ARTICLES: ReadonlyArray<ArticleInput> = [
  {
    title: 'Top phones under $500 in 2025',
    slug: 'top-phones-under-500-2025',
    cover_image: 'https://img.example.com/articles/phones-under-500.jpg',
    excerpt: 'Great value phones you can buy today.',
    content: 'Long form review content here...',
    author: 'Catalog Editorial',
    category: 'guide',
  },
  {
    title: 'Galaxy S23 Review: Still a compact champ',
    slug: 'galaxy-s23-review',
    cover_image: 'https://img.example.com/articles/galaxy-s23-review.jpg',
    excerpt: 'Our verdict after two months of use.',
    content: 'Review content...',
    author: 'Jane Doe',
    category: 'review',
  },
];
