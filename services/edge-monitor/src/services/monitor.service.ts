import {
  type BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
} from "@nestjs/common";

import type { MonitorConfig } from "../config.js";
import type { CooldownGate } from "../cooldown.js";
import type { ImageCompressor } from "../compression/frame.compressor.js";
import type { PersonDetector } from "../detection/person.detector.js";
import { EndOfStreamError, ReadError, SourceUnavailableError, describeError } from "../errors.js";
import { buildOverlay, type RenderSink } from "../render/overlay.js";
import type { FrameSource } from "../source/frame.source.js";
import {
  ALERT_STORE,
  APP_CONFIG,
  CLOCK,
  COOLDOWN_GATE,
  FRAME_COMPRESSOR,
  FRAME_SOURCE,
  MONITOR_STATS,
  PERSON_DETECTOR,
  RENDER_SINKS,
  UPLOAD_WORKER,
} from "../tokens.js";
import type { Clock, Detection, Frame } from "../types.js";
import type { AlertStore } from "./alert.store.js";
import type { MonitorStats } from "./monitor.stats.js";
import type { UploadWorker } from "./upload.worker.js";

export type MonitorState = "IDLE" | "RUNNING" | "STOPPING" | "STOPPED";

/**
 * The frame loop: read, detect, gate, hand off to the upload worker, render. The loop
 * awaits every stage in turn except the analyzer round trip, which the worker owns.
 */
@Injectable()
export class MonitorService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(MonitorService.name);
  private state: MonitorState = "IDLE";
  private loop: Promise<void> | null = null;
  private stopReason: string | null = null;

  constructor(
    @Inject(APP_CONFIG) private readonly config: MonitorConfig,
    @Inject(FRAME_SOURCE) private readonly source: FrameSource,
    @Inject(PERSON_DETECTOR) private readonly detector: PersonDetector,
    @Inject(COOLDOWN_GATE) private readonly gate: CooldownGate,
    @Inject(FRAME_COMPRESSOR) private readonly compressor: ImageCompressor,
    @Inject(UPLOAD_WORKER) private readonly worker: UploadWorker,
    @Inject(ALERT_STORE) private readonly store: AlertStore,
    @Inject(RENDER_SINKS) private readonly sinks: RenderSink[],
    @Inject(MONITOR_STATS) private readonly stats: MonitorStats,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.worker.onSettled((outcome) => {
      if (outcome.status === "failed") {
        this.stats.increment("analysesFailed");
        return;
      }
      this.stats.increment("analysesCompleted");
      if (outcome.state.level === "DANGER") {
        this.stats.increment("dangerAlerts");
      }
    });
  }

  get status(): MonitorState {
    return this.state;
  }

  onApplicationBootstrap(): void {
    if (this.config.monitor.autoStart) {
      this.start();
    }
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    await this.stop(signal ? `received ${signal}` : "application shutdown");
  }

  /** Starts the loop in the background; resolves the returned promise when it stops. */
  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }
    this.loop = this.run().catch((error: unknown) => {
      this.logger.error(`Monitor loop crashed: ${describeError(error)}`);
    });
    return this.loop;
  }

  async stop(reason = "stop requested"): Promise<void> {
    if (this.state === "STOPPED") {
      return;
    }
    if (this.state === "IDLE") {
      this.stopReason = reason;
      await this.shutdown();
      return;
    }
    if (this.state === "RUNNING") {
      this.stopReason = reason;
      this.state = "STOPPING";
      this.logger.log(`Stopping monitor: ${reason}`);
      // Wakes a pending next() so the loop notices the state change.
      await this.closeSource();
    }
    await this.loop;
  }

  async run(): Promise<void> {
    if (this.state !== "IDLE") {
      throw new Error(`monitor cannot run from state ${this.state}`);
    }
    this.state = "RUNNING";
    this.stats.start(this.clock());
    this.logger.log(`Monitoring ${this.source.description} (cooldown ${this.config.cooldownSeconds}s)`);

    try {
      while (this.isRunning()) {
        let frame: Frame;
        try {
          frame = await this.source.next();
        } catch (error) {
          if (!this.isRunning()) {
            break;
          }
          if (error instanceof ReadError) {
            this.logger.warn(`Frame read failed: ${error.message}`);
            continue;
          }
          if (error instanceof EndOfStreamError) {
            this.stopReason = error.message;
            break;
          }
          if (error instanceof SourceUnavailableError) {
            this.stopReason = error.message;
            this.logger.error(`Video source unavailable: ${error.message}`);
            break;
          }
          throw error;
        }
        await this.processFrame(frame);
      }
    } finally {
      await this.shutdown();
    }
  }

  private async processFrame(frame: Frame): Promise<void> {
    const now = this.clock();

    let detection: Detection;
    try {
      detection = await this.detector.detect(frame, this.config.thresholds.confidence);
    } catch (error) {
      this.stats.increment("detectionErrors");
      this.logger.warn(`Detection failed on frame ${frame.seq}: ${describeError(error)}`);
      return;
    }
    this.stats.recordFrame(now, detection.boxes.length);

    if (this.gate.evaluate(detection, now) === "allow") {
      this.stats.increment("triggers");
      await this.dispatch(frame, now);
    }

    const overlay = buildOverlay({
      state: this.store.current(),
      detection,
      stats: this.stats.snapshot(),
      now,
      displayMs: this.config.overlay.alertDisplaySeconds * 1000,
    });
    for (const sink of this.sinks) {
      try {
        await sink.render(frame, overlay);
      } catch (error) {
        this.logger.warn(`Render sink ${sink.name} failed on frame ${frame.seq}: ${describeError(error)}`);
      }
    }
  }

  private async dispatch(frame: Frame, now: number): Promise<void> {
    let image: Buffer;
    try {
      image = await this.compressor.compress(frame);
    } catch (error) {
      this.logger.warn(`Compression failed on frame ${frame.seq}: ${describeError(error)}`);
      return;
    }
    if (this.worker.submit({ image, frameSeq: frame.seq, enqueuedAt: now })) {
      this.stats.increment("uploadsSubmitted");
    } else {
      this.stats.increment("uploadsRejected");
      this.logger.debug(`Upload still in flight; frame ${frame.seq} not sent`);
    }
  }

  private async shutdown(): Promise<void> {
    this.state = "STOPPING";
    await this.closeSource();
    const drained = await this.worker.drain(this.config.monitor.drainGraceMs);
    if (!drained) {
      this.logger.warn(`Analysis still in flight after ${this.config.monitor.drainGraceMs}ms; abandoning it`);
    }
    this.state = "STOPPED";
    this.logger.log(`Monitor stopped${this.stopReason ? `: ${this.stopReason}` : ""}`);
  }

  private isRunning(): boolean {
    return this.state === "RUNNING";
  }

  private async closeSource(): Promise<void> {
    try {
      await this.source.close();
    } catch (error) {
      this.logger.error(`Closing ${this.source.description} failed: ${describeError(error)}`);
    }
  }
}
