import {
  buildProductFilter,
  buildProductQuery,
  patternParams,
  resolvePageWindow,
  resolveSort,
  type ProductFilterCriteria,
  type ProductQueryOptions,
} from '../query/product-query.builder';
import { InMemoryCollection } from '../../../../test/helpers/in-memory-mongo';
import { SEED_PRODUCTS } from '../../admin/internal/catalog.seeds';

const OPTS: ProductQueryOptions = {
  regexMode: 'raw',
  defaultLimit: 20,
  maxLimit: 100,
};

/** Titles matched by a criteria set against the sample products. */
async function titlesFor(
  criteria: ProductFilterCriteria,
  mode: ProductQueryOptions['regexMode'] = 'raw',
): Promise<string[]> {
  const coll = new InMemoryCollection('product');
  await coll.insertMany(SEED_PRODUCTS.map((p) => ({ ...p })));
  const docs = await coll.find(buildProductFilter(criteria, mode)).toArray();
  return docs.map((d) => String(d.title));
}

describe('buildProductFilter', () => {
  it('returns match-all for empty criteria', async () => {
    expect(buildProductFilter({}, 'raw')).toEqual({});
    expect(buildProductFilter({ category: '', search: '' }, 'raw')).toEqual({});
    expect(await titlesFor({})).toEqual([
      'iPhone 15 Pro',
      'Samsung Galaxy S23',
      'OnePlus 11',
    ]);
  });

  it('builds anchored case-insensitive predicates for category and brand', () => {
    expect(buildProductFilter({ category: 'mobile', brand: 'Apple' }, 'raw')).toEqual({
      category: { $regex: '^mobile$', $options: 'i' },
      brand: { $regex: '^Apple$', $options: 'i' },
    });
  });

  it.each(['apple', 'APPLE', 'ApPlE'])('brand=%s matches Apple only', async (brand) => {
    expect(await titlesFor({ brand })).toEqual(['iPhone 15 Pro']);
  });

  it('does not treat brand as a prefix match', async () => {
    expect(await titlesFor({ brand: 'App' })).toEqual([]);
  });

  it('combines price bounds into one inclusive range', () => {
    expect(buildProductFilter({ minPrice: 700, maxPrice: 900 }, 'raw')).toEqual({
      price: { $gte: 700, $lte: 900 },
    });
    expect(buildProductFilter({ minPrice: 0 }, 'raw')).toEqual({
      price: { $gte: 0 },
    });
    expect(buildProductFilter({ maxPrice: 799 }, 'raw')).toEqual({
      price: { $lte: 799 },
    });
  });

  it('bounds are inclusive', async () => {
    expect(await titlesFor({ minPrice: 799, maxPrice: 799 })).toEqual([
      'Samsung Galaxy S23',
    ]);
  });

  it('an inverted price range matches nothing', async () => {
    expect(await titlesFor({ minPrice: 900, maxPrice: 700 })).toEqual([]);
  });

  it('category + price window returns exactly the Galaxy S23', async () => {
    expect(
      await titlesFor({ category: 'mobile', minPrice: 700, maxPrice: 900 }),
    ).toEqual(['Samsung Galaxy S23']);
  });

  it('adds one substring predicate per specs field', () => {
    expect(
      buildProductFilter(
        { ram: '8GB', storage: '256', battery: 'mAh', camera: '50MP', os: 'android' },
        'raw',
      ),
    ).toEqual({
      'specs.ram': { $regex: '8GB', $options: 'i' },
      'specs.storage': { $regex: '256', $options: 'i' },
      'specs.battery': { $regex: 'mAh', $options: 'i' },
      'specs.camera': { $regex: '50MP', $options: 'i' },
      'specs.os': { $regex: 'android', $options: 'i' },
    });
  });

  it('ANDs specs predicates', async () => {
    expect(await titlesFor({ ram: '8gb', os: 'android' })).toEqual([
      'Samsung Galaxy S23',
    ]);
    expect(await titlesFor({ storage: '256GB' })).toEqual([
      'Samsung Galaxy S23',
      'OnePlus 11',
    ]);
  });

  it('search ORs across title, brand and tags', () => {
    expect(buildProductFilter({ search: 'pro' }, 'raw')).toEqual({
      $or: [
        { title: { $regex: 'pro', $options: 'i' } },
        { brand: { $regex: 'pro', $options: 'i' } },
        { tags: { $regex: 'pro', $options: 'i' } },
      ],
    });
  });

  it('search matches when any single field matches', async () => {
    // title only
    expect(await titlesFor({ search: 'pro' })).toEqual(['iPhone 15 Pro']);
    // brand only
    expect(await titlesFor({ search: 'apple' })).toEqual(['iPhone 15 Pro']);
    // tags only
    expect(await titlesFor({ search: 'VALUE' })).toEqual(['OnePlus 11']);
  });

  it('search combines with other predicates by AND', async () => {
    expect(await titlesFor({ search: 'flagship', maxPrice: 800 })).toEqual([
      'Samsung Galaxy S23',
    ]);
  });

  describe('regex mode', () => {
    it('raw passes metacharacters through', async () => {
      expect(buildProductFilter({ search: 'S2.' }, 'raw')).toMatchObject({
        $or: [{ title: { $regex: 'S2.' } }, {}, {}],
      });
      expect(await titlesFor({ search: 'one|iphone' })).toEqual([
        'iPhone 15 Pro',
        'OnePlus 11',
      ]);
    });

    it('raw leaves pattern validity to the store', () => {
      expect(buildProductFilter({ search: '(?i)iphone', os: '[' }, 'raw')).toEqual({
        'specs.os': { $regex: '[', $options: 'i' },
        $or: [
          { title: { $regex: '(?i)iphone', $options: 'i' } },
          { brand: { $regex: '(?i)iphone', $options: 'i' } },
          { tags: { $regex: '(?i)iphone', $options: 'i' } },
        ],
      });
    });

    it('raw accepts a leading inline flag group', async () => {
      expect(await titlesFor({ search: '(?i)IPHONE' })).toEqual(['iPhone 15 Pro']);
    });

    it('escaped matches the input literally', async () => {
      expect(buildProductFilter({ category: 'a.b' }, 'escaped')).toEqual({
        category: { $regex: '^a\\.b$', $options: 'i' },
      });
      expect(await titlesFor({ search: 'one|iphone' }, 'escaped')).toEqual([]);
      expect(await titlesFor({ search: '(' }, 'escaped')).toEqual([]);
      expect(await titlesFor({ camera: '50MP + 48MP' }, 'escaped')).toEqual([
        'OnePlus 11',
      ]);
    });

    it('escaped and raw agree on plain input', async () => {
      const plain: ProductFilterCriteria = { brand: 'samsung', ram: '8GB' };
      expect(await titlesFor(plain, 'escaped')).toEqual(await titlesFor(plain, 'raw'));
    });
  });
});

describe('patternParams', () => {
  it('names the HTTP parameters that carry a pattern', () => {
    expect(
      patternParams({
        search: 'x',
        os: 'ios',
        brand: 'b',
        minPrice: 1,
        category: '',
      }),
    ).toEqual(['brand', 'os_name', 'search']);
  });

  it('is empty when no pattern was given', () => {
    expect(patternParams({ maxPrice: 10 })).toEqual([]);
  });
});

describe('resolveSort', () => {
  it('maps each policy to its directive', () => {
    expect(resolveSort('popularity')).toEqual({ popularity: -1 });
    expect(resolveSort('latest')).toEqual({ created_at: -1 });
    expect(resolveSort('price_asc')).toEqual({ price: 1 });
    expect(resolveSort('price_desc')).toEqual({ price: -1 });
  });

  it('absent policy means no sort', () => {
    expect(resolveSort(undefined)).toBeUndefined();
  });
});

describe('resolvePageWindow', () => {
  const limits = { defaultLimit: 20, maxLimit: 100 };

  it('defaults to page 1 and the default limit', () => {
    expect(resolvePageWindow({}, limits)).toEqual({ page: 1, limit: 20, skip: 0 });
  });

  it('clamps page 0 and negative pages to 1', () => {
    expect(resolvePageWindow({ page: 0, limit: 5 }, limits)).toEqual({
      page: 1,
      limit: 5,
      skip: 0,
    });
    expect(resolvePageWindow({ page: -3, limit: 5 }, limits).skip).toBe(0);
  });

  it('computes the offset from page and limit', () => {
    expect(resolvePageWindow({ page: 3, limit: 10 }, limits)).toEqual({
      page: 3,
      limit: 10,
      skip: 20,
    });
  });

  it('caps the limit', () => {
    expect(resolvePageWindow({ page: 2, limit: 500 }, limits)).toEqual({
      page: 2,
      limit: 100,
      skip: 100,
    });
  });
});

describe('buildProductQuery', () => {
  it('bundles filter, sort and window', () => {
    expect(
      buildProductQuery({ brand: 'apple' }, 'price_desc', { page: 2, limit: 2 }, OPTS),
    ).toEqual({
      filter: { brand: { $regex: '^apple$', $options: 'i' } },
      sort: { price: -1 },
      page: 2,
      limit: 2,
      skip: 2,
    });
  });

  it('omits the sort when no policy is given', () => {
    const plan = buildProductQuery({}, undefined, {}, OPTS);
    expect(plan.sort).toBeUndefined();
    expect(plan.filter).toEqual({});
  });
});
