import { Logger, type LoggerService } from "@nestjs/common";

import type { AlertLevel, Frame } from "../types.js";
import type { Overlay, RenderSink } from "./overlay.js";

/** Headless sink: writes a line whenever the displayed level changes. */
export class LogRenderSink implements RenderSink {
  readonly name = "log";
  private readonly logger: LoggerService;
  private lastLevel: AlertLevel | null = null;

  constructor(logger?: LoggerService) {
    this.logger = logger ?? new Logger(LogRenderSink.name);
  }

  render(frame: Frame, overlay: Overlay): void {
    if (overlay.level === this.lastLevel) {
      return;
    }
    this.lastLevel = overlay.level;
    const line = `Frame ${frame.seq}: ${overlay.lines[1]} | ${overlay.lines[2]}`;
    if (overlay.level === "DANGER") {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }
}
