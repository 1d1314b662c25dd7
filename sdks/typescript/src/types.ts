export type AlertLevel = 'SAFE' | 'CAUTION' | 'DANGER';

export type MonitorState = 'IDLE' | 'RUNNING' | 'STOPPING' | 'STOPPED';

export interface HealthResponse {
  status: 'ok';
  state: MonitorState;
  source: string;
}

export interface AlertResponse {
  level: AlertLevel;
  type: string;
  message: string;
  confidence: number;
  updatedAt: string;
  /** -1 until the first analysis has been published. */
  sourceFrameSeq: number;
}

export interface StatsResponse {
  frames: number;
  fps: number;
  personFrames: number;
  lastPersonCount: number;
  detectionErrors: number;
  triggers: number;
  uploadsSubmitted: number;
  uploadsRejected: number;
  analysesCompleted: number;
  analysesFailed: number;
  dangerAlerts: number;
  notificationsSent: number;
  startedAt: number | null;
}

export interface StopResponse {
  state: MonitorState;
  reason: string;
}
