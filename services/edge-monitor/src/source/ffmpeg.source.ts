import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { access } from "node:fs/promises";
import type { Readable } from "node:stream";

import { Logger, type LoggerService } from "@nestjs/common";

import { EndOfStreamError, ReadError, SourceUnavailableError, describeError } from "../errors.js";
import type { Clock, Frame, WaitFn } from "../types.js";
import type { FrameSource, SourceKind } from "./frame.source.js";
import { cameraDevice, sourceKind } from "./frame.source.js";

export interface FrameProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: string[]) => FrameProcess;

export interface FfmpegSourceSettings {
  source: string;
  width: number;
  height: number;
  fps: number;
  targetFps: number;
  loop: boolean;
  ffmpegPath: string;
  /** How long ffmpeg may take to deliver its first frame after a (re)start. */
  startTimeoutMs: number;
}

export interface FfmpegSourceDeps {
  spawn?: SpawnFn;
  clock?: Clock;
  wait?: WaitFn;
  logger?: LoggerService;
  /** Frames held for a slow consumer before live sources start dropping the oldest. */
  bufferFrames?: number;
}

type StreamEnd = { code: number | null; signal: NodeJS.Signals | null; error?: Error };

const STDERR_TAIL_BYTES = 2048;

const defaultSpawn: SpawnFn = (command, args) => spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

/**
 * Decodes a camera, network stream or video file with an ffmpeg child process that
 * writes packed rgb24 frames of the configured size to stdout.
 */
export class FfmpegFrameSource implements FrameSource {
  readonly live: boolean;
  readonly description: string;

  private readonly kind: SourceKind;
  private readonly frameBytes: number;
  private readonly bufferFrames: number;
  private readonly spawnFn: SpawnFn;
  private readonly clock: Clock;
  private readonly wait: WaitFn;
  private readonly logger: LoggerService;

  private process: FrameProcess | null = null;
  private chunks: Buffer[] = [];
  private chunkBytes = 0;
  private queue: Frame[] = [];
  private ended: StreamEnd | null = null;
  private failureReported = false;
  private paused = false;
  private closed = true;
  private stderrTail = "";
  private wake: (() => void) | null = null;
  private seq = 0;
  private lastDeliveredAt = 0;
  private dropped = 0;

  constructor(private readonly settings: FfmpegSourceSettings, deps: FfmpegSourceDeps = {}) {
    this.kind = sourceKind(settings.source);
    this.live = this.kind !== "file";
    this.description = this.kind === "camera" ? cameraDevice(settings.source) : settings.source;
    this.frameBytes = settings.width * settings.height * 3;
    this.bufferFrames = Math.max(1, deps.bufferFrames ?? 2);
    this.spawnFn = deps.spawn ?? defaultSpawn;
    this.clock = deps.clock ?? Date.now;
    this.wait = deps.wait ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.logger = deps.logger ?? new Logger(FfmpegFrameSource.name);
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  buildArgs(): string[] {
    const size = `${this.settings.width}x${this.settings.height}`;
    const input =
      this.kind === "camera"
        ? ["-f", "v4l2", "-framerate", String(this.settings.fps), "-video_size", size, "-i", this.description]
        : ["-i", this.settings.source];
    return [
      "-hide_banner",
      "-loglevel",
      "error",
      ...input,
      "-an",
      "-f",
      "rawvideo",
      "-pix_fmt",
      "rgb24",
      "-s",
      size,
      "pipe:1",
    ];
  }

  async open(): Promise<void> {
    if (this.kind === "file") {
      try {
        await access(this.settings.source);
      } catch (error) {
        throw new SourceUnavailableError(`video file not found: ${this.settings.source}`, { cause: error });
      }
    }
    this.closed = false;
    await this.start();
    this.logger.log(
      `Opened ${this.kind} source ${this.description} at ${this.settings.width}x${this.settings.height}` +
        (this.kind === "file" && this.settings.targetFps > 0 ? `, capped to ${this.settings.targetFps} fps` : ""),
    );
  }

  async next(): Promise<Frame> {
    await this.pace();
    for (;;) {
      if (this.closed) {
        throw new EndOfStreamError("source closed");
      }
      const frame = this.take();
      if (frame) {
        return frame;
      }
      if (this.ended) {
        await this.handleEnd(this.ended);
        continue;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed && this.process === null) {
      return;
    }
    this.closed = true;
    this.stop();
    this.queue = [];
    this.signal();
    this.logger.log(`Released source ${this.description}`);
  }

  private async start(): Promise<void> {
    this.resetStream();
    let child: FrameProcess;
    try {
      child = this.spawnFn(this.settings.ffmpegPath, this.buildArgs());
    } catch (error) {
      throw new SourceUnavailableError(`cannot start ffmpeg: ${describeError(error)}`, { cause: error });
    }
    this.process = child;

    child.stdout.on("data", (chunk: Buffer) => this.onData(child, chunk));
    child.stderr.on("data", (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString("utf8")).slice(-STDERR_TAIL_BYTES);
    });
    child.on("error", (error: Error) => this.onEnd(child, { code: null, signal: null, error }));
    // "close" rather than "exit": stdout is drained by then, so no trailing frame is lost.
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => this.onEnd(child, { code, signal }));

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      this.signal();
    }, this.settings.startTimeoutMs);

    // The source only counts as open once a first frame has been decoded.
    try {
      while (this.queue.length === 0) {
        if (this.closed) {
          throw new EndOfStreamError("source closed");
        }
        if (this.ended) {
          const reason = this.describeEnd(this.ended);
          this.stop();
          throw new SourceUnavailableError(`cannot open video source ${this.description}: ${reason}`);
        }
        if (timedOut) {
          this.stop();
          throw new SourceUnavailableError(
            `no frame from ${this.description} within ${this.settings.startTimeoutMs}ms`,
          );
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private onData(child: FrameProcess, chunk: Buffer): void {
    if (child !== this.process) {
      return;
    }
    this.chunks.push(chunk);
    this.chunkBytes += chunk.length;
    if (this.chunkBytes < this.frameBytes) {
      return;
    }

    let pooled = Buffer.concat(this.chunks, this.chunkBytes);
    while (pooled.length >= this.frameBytes) {
      this.enqueue(Buffer.from(pooled.subarray(0, this.frameBytes)));
      pooled = pooled.subarray(this.frameBytes);
    }
    this.chunks = pooled.length > 0 ? [pooled] : [];
    this.chunkBytes = pooled.length;
  }

  private enqueue(data: Buffer): void {
    this.seq += 1;
    this.queue.push(
      Object.freeze({
        seq: this.seq,
        width: this.settings.width,
        height: this.settings.height,
        data,
        capturedAt: this.clock(),
      }),
    );

    if (this.queue.length > this.bufferFrames) {
      if (this.live) {
        this.queue.shift();
        this.dropped += 1;
      }
    }
    if (!this.live && this.queue.length >= this.bufferFrames && !this.paused) {
      this.process?.stdout.pause();
      this.paused = true;
    }
    this.signal();
  }

  private take(): Frame | undefined {
    const frame = this.queue.shift();
    if (frame && this.paused && this.queue.length < this.bufferFrames) {
      this.paused = false;
      this.process?.stdout.resume();
    }
    return frame;
  }

  private onEnd(child: FrameProcess, end: StreamEnd): void {
    if (child !== this.process || this.ended) {
      return;
    }
    this.ended = end;
    this.signal();
  }

  private async handleEnd(end: StreamEnd): Promise<void> {
    const failed = end.error !== undefined || (end.code !== null && end.code !== 0) || end.signal !== null;
    const reason = this.describeEnd(end);

    if (this.live) {
      this.logger.warn(`Lost ${this.kind} source ${this.description} (${reason}); reconnecting`);
      await this.reopen();
      return;
    }

    if (failed && !this.failureReported) {
      this.failureReported = true;
      throw new ReadError(`reading ${this.description} failed: ${reason}`);
    }
    if (!this.settings.loop) {
      this.stop();
      throw new EndOfStreamError(`finished playing ${this.description}`);
    }
    this.logger.log(`Reached the end of ${this.description}; restarting playback`);
    this.lastDeliveredAt = 0;
    await this.reopen();
  }

  private async reopen(): Promise<void> {
    this.stop();
    try {
      await this.start();
    } catch (error) {
      this.closed = true;
      throw error;
    }
    if (this.closed) {
      throw new EndOfStreamError("source closed");
    }
  }

  /** Caps file playback to `targetFps` by sleeping off the rest of the frame interval. */
  private async pace(): Promise<void> {
    if (this.live || this.settings.targetFps <= 0) {
      return;
    }
    const interval = 1000 / this.settings.targetFps;
    if (this.lastDeliveredAt > 0) {
      const elapsed = this.clock() - this.lastDeliveredAt;
      if (elapsed < interval) {
        await this.wait(interval - elapsed);
      }
    }
    this.lastDeliveredAt = this.clock();
  }

  private stop(): void {
    const child = this.process;
    this.process = null;
    if (child) {
      child.stdout.removeAllListeners("data");
      child.stderr.removeAllListeners("data");
      child.removeAllListeners("close");
      // Late spawn errors must not surface as unhandled "error" events.
      child.removeAllListeners("error");
      child.on("error", () => undefined);
      if (this.ended === null) {
        child.kill("SIGTERM");
      }
    }
  }

  private resetStream(): void {
    this.chunks = [];
    this.chunkBytes = 0;
    this.ended = null;
    this.failureReported = false;
    this.paused = false;
    this.stderrTail = "";
  }

  private describeEnd(end: StreamEnd): string {
    if (end.error) {
      return end.error.message;
    }
    const status = end.signal ? `signal ${end.signal}` : `exit code ${end.code}`;
    const detail = this.stderrTail.trim().split("\n").pop();
    return detail ? `${status}: ${detail}` : status;
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
