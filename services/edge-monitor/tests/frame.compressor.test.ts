import sharp from "sharp";
import { describe, expect, it } from "vitest";

import { FrameCompressor } from "../src/compression/frame.compressor.js";
import { RecordingLogger, makeFrame } from "./helpers.js";

describe("FrameCompressor", () => {
  it("letterboxes frames into a square JPEG", async () => {
    const logger = new RecordingLogger();
    const compressor = new FrameCompressor({ size: 64, quality: 80 }, logger);

    const image = await compressor.compress(makeFrame(3, 32, 16, 200));
    const metadata = await sharp(image).metadata();

    expect(image.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(64);
    expect(metadata.height).toBe(64);
    expect(logger.messages("debug")).toHaveLength(1);
    expect(logger.messages("debug")[0]).toMatch(/^Compressed frame 3 to \d+\.\d KB$/);
  });

  it("pads with black around the frame", async () => {
    const compressor = new FrameCompressor({ size: 64, quality: 90 }, new RecordingLogger());

    const image = await compressor.compress(makeFrame(1, 32, 16, 255));
    const { data, info } = await sharp(image).raw().toBuffer({ resolveWithObject: true });
    const pixel = (x: number, y: number) => data[(y * info.width + x) * info.channels];

    expect(pixel(32, 2)).toBeLessThan(30);
    expect(pixel(32, 32)).toBeGreaterThan(225);
  });
});
