import type { LoggerService } from "@nestjs/common";

import type { Box, Detection, Frame } from "../src/types.js";

export type LogLevel = "log" | "error" | "warn" | "debug" | "verbose";

export class RecordingLogger implements LoggerService {
  readonly entries: { level: LogLevel; message: string }[] = [];

  log(message: unknown): void {
    this.record("log", message);
  }

  error(message: unknown): void {
    this.record("error", message);
  }

  warn(message: unknown): void {
    this.record("warn", message);
  }

  debug(message: unknown): void {
    this.record("debug", message);
  }

  verbose(message: unknown): void {
    this.record("verbose", message);
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  private record(level: LogLevel, message: unknown): void {
    this.entries.push({ level, message: String(message) });
  }
}

export function makeFrame(seq: number, width = 4, height = 2, fill = 0): Frame {
  return {
    seq,
    width,
    height,
    data: Buffer.alloc(width * height * 3, fill),
    capturedAt: seq * 100,
  };
}

export const NO_PERSON: Detection = { boxes: [], scores: [], label: "person" };

export function persons(...boxes: Box[]): Detection {
  return { boxes, scores: boxes.map(() => 0.9), label: "person" };
}

/** Resolves once every pending microtask and the next macrotask have run. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
