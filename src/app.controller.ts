// src/app.controller.ts
import { Controller, Get } from '@nestjs/common';
import { HealthService } from './modules/health/health.service';
import { DiagnosticsResponseDto } from './modules/health/dto/Diagnostics.response.dto';

export const ROOT_MESSAGE = 'Catalog API running';

@Controller()
export class AppController {
  constructor(private readonly health: HealthService) {}

  @Get()
  root(): { message: string } {
    return { message: ROOT_MESSAGE };
  }

  /** Store diagnostics; always 200. */
  @Get('test')
  async test(): Promise<DiagnosticsResponseDto> {
    return new DiagnosticsResponseDto(await this.health.diagnostics());
  }
}
