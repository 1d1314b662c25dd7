import { Module, type Provider } from "@nestjs/common";

import { ResultClassifier, defaultAlertState } from "./classifier.js";
import { createAnalyzerClient } from "./clients/analyzer.factory.js";
import type { AnalyzerClient } from "./clients/analyzer.client.js";
import { FrameCompressor } from "./compression/frame.compressor.js";
import { loadConfig, type MonitorConfig } from "./config.js";
import { ControlController } from "./controllers/control.controller.js";
import { StatusController } from "./controllers/status.controller.js";
import { CooldownGate } from "./cooldown.js";
import { HttpDetectionBackend, type DetectionBackend } from "./detection/detection.backend.js";
import { PersonDetector } from "./detection/person.detector.js";
import { LogRenderSink } from "./render/log.sink.js";
import type { RenderSink } from "./render/overlay.js";
import { SnapshotRenderSink } from "./render/snapshot.sink.js";
import { AlertNotifier } from "./services/alert.notifier.js";
import { AlertStore } from "./services/alert.store.js";
import { MonitorService } from "./services/monitor.service.js";
import { MonitorStats } from "./services/monitor.stats.js";
import { UploadWorker } from "./services/upload.worker.js";
import { FfmpegFrameSource } from "./source/ffmpeg.source.js";
import {
  ALERT_NOTIFIER,
  ALERT_STORE,
  ANALYZER_CLIENT,
  APP_CONFIG,
  CLOCK,
  COOLDOWN_GATE,
  DETECTION_BACKEND,
  FRAME_COMPRESSOR,
  FRAME_SOURCE,
  MONITOR_STATS,
  PERSON_DETECTOR,
  RENDER_SINKS,
  SNAPSHOT_SINK,
  UPLOAD_WORKER,
} from "./tokens.js";
import type { Clock } from "./types.js";

const providers: Provider[] = [
  { provide: APP_CONFIG, useFactory: () => loadConfig() },
  { provide: CLOCK, useValue: Date.now },
  {
    provide: FRAME_SOURCE,
    inject: [APP_CONFIG],
    useFactory: async (config: MonitorConfig) => {
      const source = new FfmpegFrameSource(config.video);
      await source.open();
      return source;
    },
  },
  {
    provide: DETECTION_BACKEND,
    inject: [APP_CONFIG],
    useFactory: (config: MonitorConfig) => new HttpDetectionBackend(config.detector),
  },
  {
    provide: PERSON_DETECTOR,
    inject: [DETECTION_BACKEND],
    useFactory: (backend: DetectionBackend) => PersonDetector.load(backend),
  },
  {
    provide: COOLDOWN_GATE,
    inject: [APP_CONFIG],
    useFactory: (config: MonitorConfig) => new CooldownGate(config.cooldownSeconds),
  },
  {
    provide: FRAME_COMPRESSOR,
    inject: [APP_CONFIG],
    useFactory: (config: MonitorConfig) => new FrameCompressor(config.compression),
  },
  {
    provide: ANALYZER_CLIENT,
    inject: [APP_CONFIG],
    useFactory: (config: MonitorConfig) => createAnalyzerClient(config.analyzer),
  },
  {
    provide: ALERT_STORE,
    inject: [APP_CONFIG, CLOCK],
    useFactory: (config: MonitorConfig, clock: Clock) =>
      new AlertStore(defaultAlertState(config.classifier.defaultMessage, clock())),
  },
  { provide: MONITOR_STATS, useFactory: () => new MonitorStats() },
  {
    provide: UPLOAD_WORKER,
    inject: [APP_CONFIG, ANALYZER_CLIENT, ALERT_STORE, CLOCK],
    useFactory: (config: MonitorConfig, analyzer: AnalyzerClient, store: AlertStore, clock: Clock) =>
      new UploadWorker(analyzer, new ResultClassifier(config.classifier), store, {
        timeoutMs: config.analyzer.timeoutMs,
        clock,
      }),
  },
  {
    provide: SNAPSHOT_SINK,
    inject: [APP_CONFIG],
    useFactory: (config: MonitorConfig) => new SnapshotRenderSink(config.compression.quality),
  },
  {
    provide: RENDER_SINKS,
    inject: [SNAPSHOT_SINK],
    useFactory: (snapshot: SnapshotRenderSink): RenderSink[] => [new LogRenderSink(), snapshot],
  },
  {
    provide: ALERT_NOTIFIER,
    inject: [APP_CONFIG, ALERT_STORE, MONITOR_STATS, CLOCK],
    useFactory: (config: MonitorConfig, store: AlertStore, stats: MonitorStats, clock: Clock) => {
      const notifier = new AlertNotifier(config.notifier, {
        clock,
        onSent: () => stats.increment("notificationsSent"),
      });
      notifier.attach(store);
      return notifier;
    },
  },
  MonitorService,
];

@Module({
  imports: [],
  controllers: [StatusController, ControlController],
  providers,
})
export class AppModule {}
