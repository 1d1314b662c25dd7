import { ModelLoadError, describeError } from "../errors.js";
import type { Box, Detection, Frame } from "../types.js";
import type { DetectionBackend, RawDetection } from "./detection.backend.js";

const PERSON = "person";

/**
 * Person-only view over a general object detector. Only `load` constructs one, so a
 * detector that exists always has a working backend behind it.
 */
export class PersonDetector {
  private constructor(private readonly backend: DetectionBackend) {}

  static async load(backend: DetectionBackend): Promise<PersonDetector> {
    try {
      await backend.load();
    } catch (error) {
      throw new ModelLoadError(`cannot load ${backend.name} detection backend: ${describeError(error)}`, {
        cause: error,
      });
    }
    return new PersonDetector(backend);
  }

  async detect(frame: Frame, confidenceThreshold: number): Promise<Detection> {
    const raw = await this.backend.infer(frame);
    return toPersonDetection(raw, confidenceThreshold);
  }
}

export function toPersonDetection(raw: RawDetection[], confidenceThreshold: number): Detection {
  const boxes: Box[] = [];
  const scores: number[] = [];
  for (const item of raw) {
    if (item.label.toLowerCase() !== PERSON || item.confidence < confidenceThreshold) {
      continue;
    }
    // Backends do not all order the corners.
    const [x1, y1, x2, y2] = item.bbox;
    boxes.push([
      Math.round(Math.min(x1, x2)),
      Math.round(Math.min(y1, y2)),
      Math.round(Math.abs(x2 - x1)),
      Math.round(Math.abs(y2 - y1)),
    ]);
    scores.push(item.confidence);
  }
  return { boxes, scores, label: PERSON };
}
