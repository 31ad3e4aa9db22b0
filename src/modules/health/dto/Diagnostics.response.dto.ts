// Response DTO for GET /test

import type { DiagnosticsResult } from '../health.service';

export class DiagnosticsResponseDto {
  public readonly backend: DiagnosticsResult['backend'];
  public readonly database: string;
  public readonly database_url: DiagnosticsResult['database_url'];
  public readonly database_name: DiagnosticsResult['database_name'];
  public readonly connection_status: DiagnosticsResult['connection_status'];
  public readonly collections: string[];

  public constructor(args: DiagnosticsResult) {
    this.backend = args.backend;
    this.database = args.database;
    this.database_url = args.database_url;
    this.database_name = args.database_name;
    this.connection_status = args.connection_status;
    this.collections = [...args.collections];
  }
}
