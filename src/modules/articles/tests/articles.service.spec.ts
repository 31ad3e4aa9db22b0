import { ArticlesService } from '../articles.service';
import type { MongodbService } from '../../mongodb/mongodb.service';
import { loadCatalogConfig } from '../../../config/catalog.config';
import { InMemoryMongodbService } from '../../../../test/helpers/in-memory-mongo';
import { InvalidQueryError } from '../../../lib/errors/CatalogError';

function article(slug: string, category: string, day: number) {
  return {
    title: slug,
    slug,
    content: '...',
    author: 'Test Author',
    category,
    created_at: new Date(Date.UTC(2025, 2, day)),
    updated_at: new Date(Date.UTC(2025, 2, day)),
  };
}

describe('ArticlesService', () => {
  let mongo: InMemoryMongodbService;
  let svc: ArticlesService;

  beforeEach(async () => {
    mongo = new InMemoryMongodbService();
    await mongo
      .raw('article')
      .insertMany([
        article('old-news', 'news', 1),
        article('new-review', 'review', 5),
        article('mid-news', 'News', 3),
        article('guide', 'guide', 4),
      ]);
    svc = new ArticlesService(
      mongo as unknown as MongodbService,
      loadCatalogConfig({ CATALOG_DEFAULT_LIMIT: '3', CATALOG_MAX_LIMIT: '3' }),
    );
  });

  it('orders newest first and applies the default limit', async () => {
    const res = await svc.list();
    expect(res.map((a) => a.slug)).toEqual(['new-review', 'guide', 'mid-news']);
  });

  it('filters by category case-insensitively on the whole value', async () => {
    const res = await svc.list({ category: 'NEWS' });
    expect(res.map((a) => a.slug)).toEqual(['mid-news', 'old-news']);

    await expect(svc.list({ category: 'new' })).resolves.toEqual([]);
  });

  it('honours a smaller limit and caps a larger one', async () => {
    await expect(svc.list({ limit: 1 })).resolves.toHaveLength(1);
    await expect(svc.list({ limit: 50 })).resolves.toHaveLength(3);
  });

  it('exposes public ids', async () => {
    const [first] = await svc.list({ limit: 1 });
    expect(first?.id).toMatch(/^[0-9a-f]{24}$/);
    expect(first).not.toHaveProperty('_id');
  });

  it('rejects a category pattern that does not compile in raw mode', async () => {
    await expect(svc.list({ category: '(' })).rejects.toBeInstanceOf(
      InvalidQueryError,
    );
  });
});
