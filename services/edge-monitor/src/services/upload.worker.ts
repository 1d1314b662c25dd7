import { Logger, type LoggerService } from "@nestjs/common";

import type { ResultClassifier } from "../classifier.js";
import type { AnalyzerClient } from "../clients/analyzer.client.js";
import { isJsonObject } from "../clients/analyzer.client.js";
import {
  AnalyzerTimeoutError,
  MalformedResponseError,
  MonitorError,
  NetworkError,
  describeError,
} from "../errors.js";
import type { AlertState, Clock, UploadRequest } from "../types.js";
import type { AlertStore } from "./alert.store.js";

export type UploadOutcome =
  | { status: "published"; request: UploadRequest; state: AlertState }
  | { status: "superseded"; request: UploadRequest; state: AlertState }
  | { status: "failed"; request: UploadRequest; error: MonitorError };

export type OutcomeListener = (outcome: UploadOutcome) => void;

export interface UploadWorkerOptions {
  timeoutMs: number;
  clock?: Clock;
  logger?: LoggerService;
}

/**
 * Runs at most one analyzer round trip at a time. `submit` never waits: while a request
 * is outstanding it answers `false`, which callers treat as back-pressure.
 */
export class UploadWorker {
  private readonly logger: LoggerService;
  private readonly clock: Clock;
  private readonly listeners = new Set<OutcomeListener>();
  private inFlight = false;
  private pending: Promise<UploadOutcome> | null = null;

  constructor(
    private readonly analyzer: AnalyzerClient,
    private readonly classifier: ResultClassifier,
    private readonly store: AlertStore,
    private readonly options: UploadWorkerOptions,
  ) {
    this.logger = options.logger ?? new Logger(UploadWorker.name);
    this.clock = options.clock ?? Date.now;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  submit(request: UploadRequest): boolean {
    if (this.inFlight) {
      return false;
    }
    this.inFlight = true;
    this.pending = this.process(request).finally(() => {
      this.inFlight = false;
      this.pending = null;
    });
    return true;
  }

  onSettled(listener: OutcomeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once nothing is in flight. */
  async idle(): Promise<void> {
    if (this.pending) {
      await this.pending;
    }
  }

  /**
   * Gives an outstanding request up to `graceMs` to finish. Resolves `true` when the
   * worker is idle afterwards, `false` when the request was left running.
   */
  async drain(graceMs: number): Promise<boolean> {
    const pending = this.pending;
    if (!pending) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    try {
      return await Promise.race([pending.then(() => true), grace]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async process(request: UploadRequest): Promise<UploadOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles with the timeout, not the abort it triggers.
        reject(new AnalyzerTimeoutError(this.options.timeoutMs));
        controller.abort();
      }, this.options.timeoutMs);
    });

    let outcome: UploadOutcome;
    try {
      this.logger.log(`Submitting frame ${request.frameSeq} to ${this.analyzer.name} analyzer (${request.image.length} bytes)`);
      const raw = await Promise.race([
        this.analyzer.analyze(request.image, { signal: controller.signal }),
        deadline,
      ]);
      if (!isJsonObject(raw)) {
        throw new MalformedResponseError("analyzer verdict is not a JSON object");
      }

      const state = this.classifier.classify(raw, { frameSeq: request.frameSeq, now: this.clock() });
      const accepted = this.store.publish(state);
      this.logger.log(
        `Frame ${request.frameSeq} analyzed: ${state.level} (${state.type}, confidence ${state.confidence.toFixed(2)})`,
      );
      outcome = { status: accepted ? "published" : "superseded", request, state };
    } catch (error) {
      const failure = toMonitorError(error);
      this.logger.warn(`Analysis of frame ${request.frameSeq} failed: ${failure.message}`);
      outcome = { status: "failed", request, error: failure };
    } finally {
      clearTimeout(timer);
    }

    this.notify(outcome);
    return outcome;
  }

  private notify(outcome: UploadOutcome): void {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (error) {
        this.logger.error(`Upload listener failed: ${describeError(error)}`);
      }
    }
  }
}

function toMonitorError(error: unknown): MonitorError {
  if (error instanceof MonitorError) {
    return error;
  }
  return new NetworkError(describeError(error), undefined, { cause: error });
}
