export interface MonitorStatsSnapshot {
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

/** Counters surfaced on the overlay and by `GET /stats`. */
export class MonitorStats {
  private counters: MonitorStatsSnapshot = {
    frames: 0,
    fps: 0,
    personFrames: 0,
    lastPersonCount: 0,
    detectionErrors: 0,
    triggers: 0,
    uploadsSubmitted: 0,
    uploadsRejected: 0,
    analysesCompleted: 0,
    analysesFailed: 0,
    dangerAlerts: 0,
    notificationsSent: 0,
    startedAt: null,
  };

  private windowStart: number | null = null;
  private windowFrames = 0;

  start(now: number): void {
    this.counters.startedAt = now;
    this.windowStart = now;
    this.windowFrames = 0;
  }

  recordFrame(now: number, personCount: number): void {
    this.counters.frames += 1;
    this.counters.lastPersonCount = personCount;
    if (personCount > 0) {
      this.counters.personFrames += 1;
    }

    this.windowFrames += 1;
    if (this.windowStart === null) {
      this.windowStart = now;
      return;
    }
    const elapsed = now - this.windowStart;
    if (elapsed >= 1000) {
      this.counters.fps = Number(((this.windowFrames * 1000) / elapsed).toFixed(1));
      this.windowStart = now;
      this.windowFrames = 0;
    }
  }

  increment(
    key: Exclude<keyof MonitorStatsSnapshot, "fps" | "startedAt" | "lastPersonCount" | "frames" | "personFrames">,
  ): void {
    this.counters[key] += 1;
  }

  snapshot(): MonitorStatsSnapshot {
    return { ...this.counters };
  }
}
