import { z } from "zod";

import type { AlertLevel, AlertState, ProviderResponse, Rgb } from "./types.js";

const field = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

// Each field degrades to `undefined` on its own; one bad field never discards the rest.
const providerResponseSchema = z.object({
  is_danger: field(z.boolean()),
  alert_type: field(z.string()),
  alert_message: field(z.string()),
  reasoning: field(z.string()),
  confidence: field(z.number()),
});

export function decodeProviderResponse(raw: unknown): ProviderResponse {
  const parsed = providerResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

export interface ClassifierOptions {
  benignTypes: string[];
  defaultMessage: string;
}

export interface ClassifyContext {
  frameSeq: number;
  now: number;
}

export const LEVEL_COLORS: Record<AlertLevel, Rgb> = {
  DANGER: [255, 0, 0],
  CAUTION: [255, 255, 0],
  SAFE: [0, 255, 0],
};

export type Salience = "high" | "medium" | "neutral";

export const LEVEL_SALIENCE: Record<AlertLevel, Salience> = {
  DANGER: "high",
  CAUTION: "medium",
  SAFE: "neutral",
};

export class ResultClassifier {
  private readonly benign: Set<string>;

  constructor(private readonly options: ClassifierOptions) {
    this.benign = new Set(options.benignTypes.map((type) => type.trim().toLowerCase()));
  }

  classify(raw: unknown, context: ClassifyContext): AlertState {
    return this.classifyDecoded(decodeProviderResponse(raw), context);
  }

  classifyDecoded(response: ProviderResponse, context: ClassifyContext): AlertState {
    const alertType = nonEmpty(response.alert_type);
    const level = this.levelFor(response.is_danger === true, alertType);

    return Object.freeze({
      level,
      type: alertType ?? defaultTypeFor(level),
      message: nonEmpty(response.alert_message) ?? nonEmpty(response.reasoning) ?? this.options.defaultMessage,
      confidence: normalizeConfidence(response.confidence),
      updatedAt: context.now,
      sourceFrameSeq: context.frameSeq,
    });
  }

  isBenign(alertType: string): boolean {
    return this.benign.has(alertType.trim().toLowerCase());
  }

  private levelFor(isDanger: boolean, alertType: string | undefined): AlertLevel {
    if (isDanger) {
      return "DANGER";
    }
    if (alertType !== undefined && !this.isBenign(alertType)) {
      return "CAUTION";
    }
    return "SAFE";
  }
}

export function defaultAlertState(defaultMessage: string, now: number): AlertState {
  return Object.freeze({
    level: "SAFE",
    type: "safe",
    message: defaultMessage,
    confidence: 0,
    updatedAt: now,
    sourceFrameSeq: -1,
  });
}

function defaultTypeFor(level: AlertLevel): string {
  return level === "DANGER" ? "danger" : "safe";
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeConfidence(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
