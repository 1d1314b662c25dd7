import { Logger, type LoggerService } from "@nestjs/common";
import sharp from "sharp";

import type { Frame } from "../types.js";

export interface CompressionSettings {
  size: number;
  quality: number;
}

export interface ImageCompressor {
  compress(frame: Frame): Promise<Buffer>;
}

/** Letterboxes a frame onto a black square and encodes it as JPEG for upload. */
export class FrameCompressor implements ImageCompressor {
  private readonly logger: LoggerService;

  constructor(
    private readonly settings: CompressionSettings,
    logger?: LoggerService,
  ) {
    this.logger = logger ?? new Logger(FrameCompressor.name);
  }

  async compress(frame: Frame): Promise<Buffer> {
    const image = await sharp(frame.data, {
      raw: { width: frame.width, height: frame.height, channels: 3 },
    })
      .resize(this.settings.size, this.settings.size, {
        fit: "contain",
        background: { r: 0, g: 0, b: 0 },
      })
      .jpeg({ quality: this.settings.quality })
      .toBuffer();
    this.logger.debug?.(`Compressed frame ${frame.seq} to ${(image.length / 1024).toFixed(1)} KB`);
    return image;
  }
}
