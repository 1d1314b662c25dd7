import { LEVEL_COLORS, LEVEL_SALIENCE, type Salience } from "../classifier.js";
import type { MonitorStatsSnapshot } from "../services/monitor.stats.js";
import type { AlertLevel, AlertState, Box, Detection, Frame, Rgb } from "../types.js";

export interface Overlay {
  level: AlertLevel;
  salience: Salience;
  color: Rgb;
  /** Set while a DANGER state is younger than the display window. */
  banner: string | null;
  lines: string[];
  boxes: readonly Box[];
}

export interface RenderSink {
  readonly name: string;
  render(frame: Frame, overlay: Overlay): Promise<void> | void;
}

export interface OverlayContext {
  state: AlertState;
  detection: Detection;
  stats: MonitorStatsSnapshot;
  now: number;
  displayMs: number;
}

export function buildOverlay({ state, detection, stats, now, displayMs }: OverlayContext): Overlay {
  const age = state.sourceFrameSeq < 0 ? null : Math.max(0, now - state.updatedAt);
  const showBanner = state.level === "DANGER" && age !== null && age < displayMs;

  const lines = [
    `FPS: ${stats.fps.toFixed(1)}`,
    `Status: ${state.level} (${state.type})`,
    `Message: ${state.message}`,
    `Persons: ${detection.boxes.length}`,
    `Analyses: ${stats.analysesCompleted} | Alerts: ${stats.dangerAlerts}`,
  ];
  if (age !== null) {
    lines.push(`Last analysis: ${(age / 1000).toFixed(1)}s ago (confidence ${state.confidence.toFixed(2)})`);
  }

  return {
    level: state.level,
    salience: LEVEL_SALIENCE[state.level],
    color: LEVEL_COLORS[state.level],
    banner: showBanner ? `DANGER: ${state.message}` : null,
    lines,
    boxes: detection.boxes,
  };
}
