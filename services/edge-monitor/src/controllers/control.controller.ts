import { Body, Controller, HttpCode, HttpStatus, Inject, Post, ValidationPipe } from "@nestjs/common";

import { StopRequestDto } from "../dto/stop-request.dto.js";
import type { StopResponseDto } from "../dto/status-response.dto.js";
import { MonitorService } from "../services/monitor.service.js";

@Controller()
export class ControlController {
  constructor(
    @Inject(MonitorService)
    private readonly monitor: MonitorService,
  ) {}

  @Post("stop")
  @HttpCode(HttpStatus.ACCEPTED)
  async stop(
    @Body(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, expectedType: StopRequestDto }))
    body: StopRequestDto,
  ): Promise<StopResponseDto> {
    const reason = body.reason ?? "stop requested over HTTP";
    await this.monitor.stop(reason);
    return { state: this.monitor.status, reason };
  }
}
