import type { MonitorState } from "../services/monitor.service.js";
import type { AlertLevel } from "../types.js";

export interface HealthResponseDto {
  status: "ok";
  state: MonitorState;
  source: string;
}

export interface AlertResponseDto {
  level: AlertLevel;
  type: string;
  message: string;
  confidence: number;
  updatedAt: string;
  sourceFrameSeq: number;
}

export interface StopResponseDto {
  state: MonitorState;
  reason: string;
}
