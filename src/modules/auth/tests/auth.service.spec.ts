import { Logger } from '@nestjs/common';
import { AuthService } from '../auth.service';
import type { MongodbService } from '../../mongodb/mongodb.service';
import { InMemoryMongodbService } from '../../../../test/helpers/in-memory-mongo';

describe('AuthService', () => {
  let mongo: InMemoryMongodbService;
  let svc: AuthService;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    mongo = new InMemoryMongodbService();
    svc = new AuthService(mongo as unknown as MongodbService);
  });

  it('creates a local user on first login', async () => {
    const user = await svc.login('ada@example.com', 'Ada');

    expect(user).toMatchObject({
      email: 'ada@example.com',
      name: 'Ada',
      provider: 'local',
    });
    expect(user.id).toMatch(/^[0-9a-f]{24}$/);
    expect(user.created_at).toBeInstanceOf(Date);
    expect(user.updated_at).toEqual(user.created_at);
    expect(mongo.raw('user').docs).toHaveLength(1);
  });

  it('defaults the name to Guest', async () => {
    const user = await svc.login('anon@example.com');
    expect(user.name).toBe('Guest');
  });

  it('returns the existing user on later logins without changing it', async () => {
    const first = await svc.login('ada@example.com', 'Ada');
    const second = await svc.login('ada@example.com', 'Someone Else');

    expect(second.id).toBe(first.id);
    expect(second.name).toBe('Ada');
    expect(mongo.raw('user').docs).toHaveLength(1);
  });
});
