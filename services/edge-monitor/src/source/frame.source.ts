import type { Frame } from "../types.js";

/**
 * Where frames come from. `next` resolves with the newest frame available, waiting when
 * none is buffered, and rejects with EndOfStreamError, ReadError or
 * SourceUnavailableError. `close` is idempotent and must be called on every exit path.
 */
export interface FrameSource {
  readonly description: string;
  readonly live: boolean;
  open(): Promise<void>;
  next(): Promise<Frame>;
  close(): Promise<void>;
}

export type SourceKind = "camera" | "stream" | "file";

const CAMERA_INDEX = /^\d+$/;
const CAMERA_DEVICE = /^\/dev\/video\d+$/;
const STREAM_URL = /^(rtsp|rtmp|udp|http|https):\/\//i;

export function sourceKind(source: string): SourceKind {
  if (CAMERA_INDEX.test(source) || CAMERA_DEVICE.test(source)) {
    return "camera";
  }
  if (STREAM_URL.test(source)) {
    return "stream";
  }
  return "file";
}

export function cameraDevice(source: string): string {
  return CAMERA_INDEX.test(source) ? `/dev/video${source}` : source;
}
