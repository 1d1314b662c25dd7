import { Controller, Get, Header, Inject, NotFoundException, StreamableFile } from "@nestjs/common";

import type { AlertResponseDto, HealthResponseDto } from "../dto/status-response.dto.js";
import type { SnapshotRenderSink } from "../render/snapshot.sink.js";
import type { AlertStore } from "../services/alert.store.js";
import { MonitorService } from "../services/monitor.service.js";
import type { MonitorStats, MonitorStatsSnapshot } from "../services/monitor.stats.js";
import type { FrameSource } from "../source/frame.source.js";
import { ALERT_STORE, FRAME_SOURCE, MONITOR_STATS, SNAPSHOT_SINK } from "../tokens.js";

@Controller()
export class StatusController {
  constructor(
    @Inject(MonitorService) private readonly monitor: MonitorService,
    @Inject(ALERT_STORE) private readonly store: AlertStore,
    @Inject(MONITOR_STATS) private readonly stats: MonitorStats,
    @Inject(SNAPSHOT_SINK) private readonly snapshot: SnapshotRenderSink,
    @Inject(FRAME_SOURCE) private readonly source: FrameSource,
  ) {}

  @Get("health")
  health(): HealthResponseDto {
    return { status: "ok", state: this.monitor.status, source: this.source.description };
  }

  @Get("alert")
  alert(): AlertResponseDto {
    const state = this.store.current();
    return {
      level: state.level,
      type: state.type,
      message: state.message,
      confidence: state.confidence,
      updatedAt: new Date(state.updatedAt).toISOString(),
      sourceFrameSeq: state.sourceFrameSeq,
    };
  }

  @Get("stats")
  statistics(): MonitorStatsSnapshot {
    return this.stats.snapshot();
  }

  @Get("snapshot.jpg")
  @Header("Cache-Control", "no-store")
  async snapshotJpeg(): Promise<StreamableFile> {
    const image = await this.snapshot.renderJpeg();
    if (!image) {
      throw new NotFoundException("no frame has been processed yet");
    }
    return new StreamableFile(image, { type: "image/jpeg", length: image.length });
  }
}
