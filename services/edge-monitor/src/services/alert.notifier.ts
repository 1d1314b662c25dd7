import { Logger, type LoggerService, type OnApplicationShutdown } from "@nestjs/common";
import fetch from "node-fetch";

import { NetworkError, describeError } from "../errors.js";
import type { AlertState, Clock } from "../types.js";
import type { AlertStore } from "./alert.store.js";

export interface NotifierSettings {
  cooldownSeconds: number;
  webhookUrl?: string;
  location: string;
  webhookTimeoutMs?: number;
}

export interface AlertNotification {
  subject: string;
  body: string;
  alert: {
    type: string;
    message: string;
    confidence: number;
    location: string;
    frameSeq: number;
  };
  timestamp: string;
}

export interface NotifierOptions {
  clock?: Clock;
  logger?: LoggerService;
  onSent?: (notification: AlertNotification) => void;
}

/**
 * Pushes newly published DANGER states to operators. Delivery is fire-and-forget; a
 * failing channel is logged and the monitor carries on.
 */
export class AlertNotifier implements OnApplicationShutdown {
  private readonly logger: LoggerService;
  private readonly clock: Clock;
  private lastSentAt: number | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly settings: NotifierSettings,
    private readonly options: NotifierOptions = {},
  ) {
    this.logger = options.logger ?? new Logger(AlertNotifier.name);
    this.clock = options.clock ?? Date.now;
  }

  attach(store: AlertStore): void {
    this.detach();
    this.unsubscribe = store.subscribe((next, previous) => {
      if (next.level === "DANGER" && next.sourceFrameSeq !== previous.sourceFrameSeq) {
        this.track(this.notify(next));
      }
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async onApplicationShutdown(): Promise<void> {
    this.detach();
    await this.flush();
  }

  /** Resolves once every delivery started so far has finished. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async notify(state: AlertState): Promise<boolean> {
    const now = this.clock();
    if (this.lastSentAt !== null && now - this.lastSentAt < this.settings.cooldownSeconds * 1000) {
      this.logger.debug?.(`Alert for frame ${state.sourceFrameSeq} suppressed by notification cooldown`);
      return false;
    }
    this.lastSentAt = now;

    const notification = this.compose(state, now);
    this.logger.warn(`${notification.subject} | ${state.message} @ ${this.settings.location}`);

    if (this.settings.webhookUrl) {
      try {
        await this.sendWebhook(this.settings.webhookUrl, notification);
      } catch (error) {
        this.logger.error(`Webhook notification failed: ${describeError(error)}`);
      }
    }
    this.options.onSent?.(notification);
    return true;
  }

  private compose(state: AlertState, now: number): AlertNotification {
    const timestamp = new Date(now).toISOString();
    return {
      subject: `High severity alert: ${state.type}`,
      body: [
        `Detected a high severity event:`,
        `Type: ${state.type}`,
        `Description: ${state.message}`,
        `Time: ${timestamp}`,
        `Location: ${this.settings.location}`,
      ].join("\n"),
      alert: {
        type: state.type,
        message: state.message,
        confidence: state.confidence,
        location: this.settings.location,
        frameSeq: state.sourceFrameSeq,
      },
      timestamp,
    };
  }

  private async sendWebhook(url: string, notification: AlertNotification): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.webhookTimeoutMs ?? 10000);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(notification),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new NetworkError(`webhook responded ${response.status} ${text}`, response.status);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private track(delivery: Promise<boolean>): void {
    const settled = delivery.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error(`Alert notification failed: ${describeError(error)}`);
      },
    );
    this.inFlight.add(settled);
    void settled.finally(() => this.inFlight.delete(settled));
  }
}
