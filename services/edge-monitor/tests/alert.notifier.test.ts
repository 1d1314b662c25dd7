import nock from "nock";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultAlertState } from "../src/classifier.js";
import { AlertNotifier, type AlertNotification } from "../src/services/alert.notifier.js";
import { AlertStore } from "../src/services/alert.store.js";
import type { AlertState } from "../src/types.js";
import { RecordingLogger } from "./helpers.js";

const hookUrl = "http://hooks.test";

const alert = (sourceFrameSeq: number, level: AlertState["level"] = "DANGER"): AlertState => ({
  level,
  type: "fall",
  message: "Person fell",
  confidence: 0.85,
  updatedAt: 0,
  sourceFrameSeq,
});

beforeEach(() => {
  nock.cleanAll();
});

afterEach(() => {
  nock.cleanAll();
});

describe("AlertNotifier", () => {
  it("posts new danger alerts to the webhook", async () => {
    let payload: Record<string, unknown> = {};
    const scope = nock(hookUrl)
      .post("/alerts", (body: Record<string, unknown>) => {
        payload = body;
        return true;
      })
      .reply(204);
    const logger = new RecordingLogger();
    const store = new AlertStore(defaultAlertState("Normal activity", 0));
    const notifier = new AlertNotifier(
      { cooldownSeconds: 2, webhookUrl: `${hookUrl}/alerts`, location: "hallway" },
      { clock: () => Date.UTC(2024, 0, 1), logger },
    );
    notifier.attach(store);

    store.publish(alert(4));
    await notifier.flush();

    expect(scope.isDone()).toBe(true);
    expect(payload).toEqual({
      subject: "High severity alert: fall",
      body: [
        "Detected a high severity event:",
        "Type: fall",
        "Description: Person fell",
        "Time: 2024-01-01T00:00:00.000Z",
        "Location: hallway",
      ].join("\n"),
      alert: { type: "fall", message: "Person fell", confidence: 0.85, location: "hallway", frameSeq: 4 },
      timestamp: "2024-01-01T00:00:00.000Z",
    });
    expect(logger.messages("warn")).toEqual(["High severity alert: fall | Person fell @ hallway"]);
  });

  it("ignores states below danger", async () => {
    const sent: AlertNotification[] = [];
    const store = new AlertStore(defaultAlertState("Normal activity", 0));
    const notifier = new AlertNotifier(
      { cooldownSeconds: 2, location: "hallway" },
      { logger: new RecordingLogger(), onSent: (notification) => sent.push(notification) },
    );
    notifier.attach(store);

    store.publish(alert(1, "CAUTION"));
    store.publish(alert(2, "SAFE"));
    await notifier.flush();

    expect(sent).toEqual([]);
  });

  it("suppresses alerts inside the notification cooldown", async () => {
    let now = 0;
    const sent: AlertNotification[] = [];
    const notifier = new AlertNotifier(
      { cooldownSeconds: 2, location: "hallway" },
      { clock: () => now, logger: new RecordingLogger(), onSent: (notification) => sent.push(notification) },
    );

    expect(await notifier.notify(alert(1))).toBe(true);
    now = 1999;
    expect(await notifier.notify(alert(2))).toBe(false);
    now = 2000;
    expect(await notifier.notify(alert(3))).toBe(true);
    expect(sent.map((notification) => notification.alert.frameSeq)).toEqual([1, 3]);
  });

  it("logs webhook failures without throwing", async () => {
    nock(hookUrl).post("/alerts").reply(500, "down");
    const logger = new RecordingLogger();
    const notifier = new AlertNotifier(
      { cooldownSeconds: 0, webhookUrl: `${hookUrl}/alerts`, location: "hallway" },
      { logger },
    );

    await expect(notifier.notify(alert(1))).resolves.toBe(true);
    expect(logger.messages("error")).toEqual(["Webhook notification failed: webhook responded 500 down"]);
  });

  it("stops listening once detached", async () => {
    const sent: AlertNotification[] = [];
    const store = new AlertStore(defaultAlertState("Normal activity", 0));
    const notifier = new AlertNotifier(
      { cooldownSeconds: 0, location: "hallway" },
      { logger: new RecordingLogger(), onSent: (notification) => sent.push(notification) },
    );
    notifier.attach(store);
    await notifier.onApplicationShutdown();

    store.publish(alert(9));
    await notifier.flush();

    expect(sent).toEqual([]);
  });
});
