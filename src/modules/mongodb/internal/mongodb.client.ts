import { MongoClient, type MongoClientOptions } from 'mongodb';

/**
 * Lazily connected MongoDB client owned by a single store handle.
 * - Concurrent first calls share one connect attempt.
 * - A failed attempt is forgotten so the next call can retry.
 * - close() is idempotent.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(
    private readonly uri: string,
    private readonly options: MongoClientOptions = { ignoreUndefined: true },
  ) {}

  /** Get (or create) a connected MongoClient instance. */
  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const connectPromise: Promise<MongoClient> = (async () => {
      const created = new MongoClient(this.uri, this.options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      this.connecting = undefined;
      this.client = undefined;

      if (err instanceof Error) {
        throw err;
      }
      throw new Error('Failed to connect to MongoDB');
    }
  }

  public isConnected(): boolean {
    return this.client !== undefined;
  }

  public async close(): Promise<void> {
    const current: MongoClient | undefined = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}
