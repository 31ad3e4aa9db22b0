import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  ListProductsQueryDto,
  MAX_PAGE,
} from '../dto/ListProducts.request.dto';

async function parse(query: Record<string, string>) {
  const dto = plainToInstance(ListProductsQueryDto, query);
  const errors = await validate(dto);
  return { dto, failed: errors.map((e) => e.property) };
}

describe('ListProductsQueryDto', () => {
  it('treats empty and blank numbers as absent', async () => {
    const { dto, failed } = await parse({
      minPrice: '',
      maxPrice: ' ',
      page: '',
      limit: '',
    });
    expect(failed).toEqual([]);
    expect(dto.minPrice).toBeUndefined();
    expect(dto.maxPrice).toBeUndefined();
    expect(dto.page).toBeUndefined();
    expect(dto.limit).toBeUndefined();
  });

  it('converts numeric strings', async () => {
    const { dto, failed } = await parse({ minPrice: '700', page: '2', limit: '5' });
    expect(failed).toEqual([]);
    expect(dto).toMatchObject({ minPrice: 700, page: 2, limit: 5 });
  });

  it('rejects non-numeric values', async () => {
    const { failed } = await parse({ maxPrice: 'cheap', limit: 'x' });
    expect(failed).toEqual(['maxPrice', 'limit']);
  });

  it('bounds the page', async () => {
    expect((await parse({ page: String(MAX_PAGE) })).failed).toEqual([]);
    expect((await parse({ page: '1e300' })).failed).toEqual(['page']);
  });
});
