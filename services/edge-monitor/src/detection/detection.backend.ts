import fetch, { type Response } from "node-fetch";
import { z } from "zod";

import { NetworkError, describeError } from "../errors.js";
import type { Frame } from "../types.js";

export interface RawDetection {
  label: string;
  confidence: number;
  /** Corner coordinates in pixels: x1, y1, x2, y2. */
  bbox: [number, number, number, number];
}

export interface DetectionBackend {
  readonly name: string;
  load(): Promise<void>;
  infer(frame: Frame): Promise<RawDetection[]>;
}

const detectResponseSchema = z.object({
  detections: z.array(
    z.object({
      label: z.string(),
      confidence: z.number(),
      bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    }),
  ),
});

export interface HttpDetectionSettings {
  url: string;
  timeoutMs: number;
}

/** Object detector running as an HTTP inference node on the edge device. */
export class HttpDetectionBackend implements DetectionBackend {
  readonly name = "http";

  constructor(private readonly settings: HttpDetectionSettings) {}

  async load(): Promise<void> {
    const response = await this.request("health", { method: "GET" });
    await response.arrayBuffer();
  }

  async infer(frame: Frame): Promise<RawDetection[]> {
    const response = await this.request(`detect?width=${frame.width}&height=${frame.height}`, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: frame.data,
    });
    const parsed = detectResponseSchema.parse(await response.json());
    return parsed.detections;
  }

  private async request(
    path: string,
    init: { method: string; headers?: Record<string, string>; body?: Buffer },
  ): Promise<Response> {
    const base = this.settings.url.endsWith("/") ? this.settings.url : `${this.settings.url}/`;
    const url = new URL(path, base).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const text = await response.text();
        throw new NetworkError(`Detector error: ${response.status} ${text}`, response.status);
      }
      return response;
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new NetworkError(`Detector request timed out after ${this.settings.timeoutMs}ms`);
      }
      throw new NetworkError(`Detector request failed: ${describeError(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
