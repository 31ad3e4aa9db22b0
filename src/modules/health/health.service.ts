import { Inject, Injectable, Logger } from '@nestjs/common';
import { MongodbService } from '../mongodb/mongodb.service';
import { mongoConfig, type MongoConfig } from '../../infra/mongo/mongo.config';

export interface PingResult {
  ok: true;
  timestamp: string; // ISO-8601 timestamp
  epochMs: number;
  uptimeSec: number;
}

export interface InfoResult {
  status: 'ok';
  timestamp: string; // ISO-8601 timestamp
  uptimeSec: number;
  pid: number;
  node: string;
  env: string;
  version: string | null;
}

export interface DiagnosticsResult {
  backend: 'running';
  database: string;
  database_url: 'set' | 'not set';
  database_name: 'set' | 'not set';
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

/** Store error messages are cut to this length in diagnostics. */
export const DIAGNOSTIC_MESSAGE_MAX = 80;

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  public constructor(
    private readonly mongo: MongodbService,
    @Inject(mongoConfig.KEY) private readonly cfg: MongoConfig,
  ) {}

  public ping(): PingResult {
    const now = new Date();
    return {
      ok: true,
      timestamp: now.toISOString(),
      epochMs: now.getTime(),
      uptimeSec: Math.floor(process.uptime()),
    };
  }

  public info(): InfoResult {
    const now = new Date();
    const version =
      (process.env.APP_VERSION && String(process.env.APP_VERSION)) || null;

    return {
      status: 'ok',
      timestamp: now.toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      pid: process.pid,
      node: process.version,
      env: process.env.NODE_ENV ? String(process.env.NODE_ENV) : 'development',
      version,
    };
  }

  /**
   * Store reachability report. Never rejects: a failing store is reported
   * in the `database` field.
   */
  public async diagnostics(): Promise<DiagnosticsResult> {
    const result: DiagnosticsResult = {
      backend: 'running',
      database: 'not available',
      database_url: this.cfg.urlFromEnv ? 'set' : 'not set',
      database_name: this.cfg.nameFromEnv ? 'set' : 'not set',
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      result.collections = await this.mongo.listCollectionNames();
      result.database = 'connected';
      result.connection_status = 'Connected';
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Diagnostics could not reach the store: ${message}`);
      result.database = `error: ${message.slice(0, DIAGNOSTIC_MESSAGE_MAX)}`;
    }
    return result;
  }
}
