export interface Frame {
  readonly seq: number;
  readonly width: number;
  readonly height: number;
  /** Packed RGB24, `width * height * 3` bytes. */
  readonly data: Buffer;
  readonly capturedAt: number;
}

/** Axis-aligned box in pixels: left, top, width, height. */
export type Box = readonly [x: number, y: number, w: number, h: number];

export interface Detection {
  readonly boxes: readonly Box[];
  readonly scores: readonly number[];
  readonly label: "person";
}

export type AlertLevel = "SAFE" | "CAUTION" | "DANGER";

export interface AlertState {
  readonly level: AlertLevel;
  readonly type: string;
  readonly message: string;
  readonly confidence: number;
  readonly updatedAt: number;
  readonly sourceFrameSeq: number;
}

export interface UploadRequest {
  readonly image: Buffer;
  readonly frameSeq: number;
  readonly enqueuedAt: number;
}

export interface ProviderResponse {
  is_danger?: boolean;
  alert_type?: string;
  alert_message?: string;
  reasoning?: string;
  confidence?: number;
}

export type Rgb = readonly [r: number, g: number, b: number];

export type Clock = () => number;

export type WaitFn = (ms: number) => Promise<void>;
