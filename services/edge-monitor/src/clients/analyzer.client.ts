import { MalformedResponseError } from "../errors.js";

export interface AnalyzeOptions {
  signal: AbortSignal;
}

/**
 * Remote semantic analyzer. Resolves with the provider's verdict object exactly as it
 * came off the wire; field validation belongs to the classifier.
 */
export interface AnalyzerClient {
  readonly name: string;
  analyze(image: Buffer, options: AnalyzeOptions): Promise<unknown>;
}

export const DEFAULT_INSTRUCTION = `You are a security monitoring analyst. The local detector has seen at least one person in this camera frame.

Look closely at posture and behaviour and decide whether something dangerous is happening.

SAFE examples: exercising or stretching, sleeping or resting, deliberately lying or sitting down, ordinary activity.
DANGER examples: losing balance or suddenly falling, visible pain or inability to move, an abnormal posture suggesting injury, behaviour that puts someone at risk.
If nothing is dangerous but something still deserves attention (litter, a blocked exit, an unattended object), keep is_danger false and name it in alert_type.

Reply with strict JSON only:
{
  "is_danger": true or false,
  "alert_type": "short category, or \\"safe\\"",
  "alert_message": "one short sentence for the operator",
  "reasoning": "why you decided this",
  "confidence": number between 0.0 and 1.0
}`;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const FENCE_OPEN = /^```(?:json)?/i;
const FENCE_CLOSE = /```$/;

/** Pulls the outermost `{...}` out of model text, tolerating markdown fences and chatter. */
export function extractJsonObject(text: string): Record<string, unknown> {
  const cleaned = text.trim().replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "").trim();
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new MalformedResponseError(`no JSON object in analyzer reply: ${truncate(cleaned)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.slice(start, end + 1));
  } catch (error) {
    throw new MalformedResponseError(`analyzer reply is not valid JSON: ${truncate(cleaned)}`, { cause: error });
  }
  if (!isJsonObject(parsed)) {
    throw new MalformedResponseError("analyzer reply is not a JSON object");
  }
  return parsed;
}

function truncate(value: string, max = 120): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}
