import "reflect-metadata";

import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AppModule } from "../src/app.module.js";
import { defaultAlertState } from "../src/classifier.js";
import type { AnalyzerClient } from "../src/clients/analyzer.client.js";
import { resolveConfig } from "../src/config.js";
import type { DetectionBackend } from "../src/detection/detection.backend.js";
import { buildOverlay } from "../src/render/overlay.js";
import type { SnapshotRenderSink } from "../src/render/snapshot.sink.js";
import type { AlertStore } from "../src/services/alert.store.js";
import { MonitorStats } from "../src/services/monitor.stats.js";
import type { FrameSource } from "../src/source/frame.source.js";
import {
  ALERT_STORE,
  ANALYZER_CLIENT,
  APP_CONFIG,
  CLOCK,
  DETECTION_BACKEND,
  FRAME_SOURCE,
  SNAPSHOT_SINK,
} from "../src/tokens.js";
import { NO_PERSON, makeFrame } from "./helpers.js";

describe("Status API", () => {
  let app: INestApplication;
  let source: FrameSource;

  beforeEach(async () => {
    source = {
      description: "/dev/video0",
      live: true,
      open: vi.fn(async () => undefined),
      next: vi.fn(async () => makeFrame(1)),
      close: vi.fn(async () => undefined),
    };
    const backend: DetectionBackend = { name: "stub", load: async () => undefined, infer: async () => [] };
    const analyzer: AnalyzerClient = { name: "stub", analyze: async () => ({}) };

    const module: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(APP_CONFIG)
      .useValue(resolveConfig({ monitor: { autoStart: false } }))
      .overrideProvider(CLOCK)
      .useValue(() => 0)
      .overrideProvider(FRAME_SOURCE)
      .useValue(source)
      .overrideProvider(DETECTION_BACKEND)
      .useValue(backend)
      .overrideProvider(ANALYZER_CLIENT)
      .useValue(analyzer)
      .compile();

    app = module.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    if (app) {
      await app.close();
    }
  });

  it("reports health", async () => {
    const response = await request(app.getHttpServer()).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok", state: "IDLE", source: "/dev/video0" });
  });

  it("serves the current alert", async () => {
    const store = app.get<AlertStore>(ALERT_STORE);
    store.publish({
      level: "CAUTION",
      type: "litter",
      message: "Bottle on the floor",
      confidence: 0.6,
      updatedAt: Date.UTC(2024, 0, 1),
      sourceFrameSeq: 8,
    });

    const response = await request(app.getHttpServer()).get("/alert");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      level: "CAUTION",
      type: "litter",
      message: "Bottle on the floor",
      confidence: 0.6,
      updatedAt: "2024-01-01T00:00:00.000Z",
      sourceFrameSeq: 8,
    });
  });

  it("serves counters", async () => {
    const response = await request(app.getHttpServer()).get("/stats");

    expect(response.status).toBe(200);
    expect(response.body).toEqual(new MonitorStats().snapshot());
  });

  it("returns 404 for the snapshot before any frame", async () => {
    const response = await request(app.getHttpServer()).get("/snapshot.jpg");

    expect(response.status).toBe(404);
  });

  it("serves an annotated snapshot once a frame was rendered", async () => {
    const sink = app.get<SnapshotRenderSink>(SNAPSHOT_SINK);
    const overlay = buildOverlay({
      state: defaultAlertState("Normal activity", 0),
      detection: NO_PERSON,
      stats: new MonitorStats().snapshot(),
      now: 0,
      displayMs: 5000,
    });
    sink.render(makeFrame(1, 32, 24), overlay);

    const response = await request(app.getHttpServer()).get("/snapshot.jpg");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toBe("image/jpeg");
    expect(Buffer.isBuffer(response.body)).toBe(true);
    expect(response.body.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
  });

  it("stops the monitor on request", async () => {
    const response = await request(app.getHttpServer()).post("/stop").send({ reason: "maintenance" });

    expect(response.status).toBe(202);
    expect(response.body).toEqual({ state: "STOPPED", reason: "maintenance" });
    expect(source.close).toHaveBeenCalled();
  });

  it("validates the stop body", async () => {
    const wrongType = await request(app.getHttpServer()).post("/stop").send({ reason: 5 });
    const unknownField = await request(app.getHttpServer()).post("/stop").send({ force: true });

    expect(wrongType.status).toBe(400);
    expect(unknownField.status).toBe(400);
    expect(source.close).not.toHaveBeenCalled();
  });
});
