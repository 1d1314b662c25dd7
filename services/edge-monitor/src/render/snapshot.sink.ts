import sharp from "sharp";

import type { Frame, Rgb } from "../types.js";
import type { Overlay, RenderSink } from "./overlay.js";

const LINE_HEIGHT = 22;
const BANNER_HEIGHT = 44;

/** Keeps the newest frame so the status API can serve an annotated still on demand. */
export class SnapshotRenderSink implements RenderSink {
  readonly name = "snapshot";
  private latest: { frame: Frame; overlay: Overlay } | null = null;

  constructor(private readonly quality = 80) {}

  get hasFrame(): boolean {
    return this.latest !== null;
  }

  render(frame: Frame, overlay: Overlay): void {
    this.latest = { frame, overlay };
  }

  async renderJpeg(): Promise<Buffer | null> {
    if (!this.latest) {
      return null;
    }
    const { frame, overlay } = this.latest;
    const svg = overlaySvg(frame.width, frame.height, overlay);
    return sharp(frame.data, { raw: { width: frame.width, height: frame.height, channels: 3 } })
      .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
      .jpeg({ quality: this.quality })
      .toBuffer();
  }
}

export function overlaySvg(width: number, height: number, overlay: Overlay): string {
  const color = rgb(overlay.color);
  const parts: string[] = [];

  for (const [x, y, w, h] of overlay.boxes) {
    parts.push(`<rect x="${x}" y="${y}" width="${w}" height="${h}" fill="none" stroke="${color}" stroke-width="2"/>`);
  }

  let top = 10;
  if (overlay.banner) {
    parts.push(`<rect x="0" y="0" width="${width}" height="${BANNER_HEIGHT}" fill="${color}" fill-opacity="0.8"/>`);
    parts.push(
      `<text x="10" y="30" font-family="sans-serif" font-size="22" font-weight="bold" fill="white">${escapeXml(overlay.banner)}</text>`,
    );
    top = BANNER_HEIGHT + 10;
  }

  overlay.lines.forEach((line, index) => {
    const y = top + LINE_HEIGHT * (index + 1);
    parts.push(`<text x="10" y="${y}" font-family="sans-serif" font-size="16" fill="${color}">${escapeXml(line)}</text>`);
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${parts.join("")}</svg>`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function rgb([r, g, b]: Rgb): string {
  return `rgb(${r},${g},${b})`;
}
