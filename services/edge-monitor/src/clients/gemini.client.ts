import { GoogleGenAI, Type, type Schema } from "@google/genai";

import { MalformedResponseError } from "../errors.js";
import type { AnalyzeOptions, AnalyzerClient } from "./analyzer.client.js";
import { DEFAULT_INSTRUCTION, extractJsonObject } from "./analyzer.client.js";

export interface GeminiAnalyzerSettings {
  apiKey: string;
  model: string;
  instruction?: string;
}

const verdictSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    is_danger: { type: Type.BOOLEAN, description: "True only when someone is in danger." },
    alert_type: { type: Type.STRING, description: "Short category, or \"safe\"." },
    alert_message: { type: Type.STRING, description: "One sentence for the operator." },
    reasoning: { type: Type.STRING, description: "Why the verdict was reached." },
    confidence: { type: Type.NUMBER, description: "Confidence between 0.0 and 1.0." },
  },
  required: ["is_danger", "reasoning", "confidence"],
};

export class GeminiAnalyzerClient implements AnalyzerClient {
  readonly name = "gemini";
  private readonly ai: GoogleGenAI;
  private readonly instruction: string;

  constructor(private readonly settings: GeminiAnalyzerSettings) {
    if (!settings.apiKey) {
      throw new Error("GeminiAnalyzerClient requires an apiKey");
    }
    this.ai = new GoogleGenAI({ apiKey: settings.apiKey });
    this.instruction = settings.instruction ?? DEFAULT_INSTRUCTION;
  }

  async analyze(image: Buffer, options: AnalyzeOptions): Promise<unknown> {
    const response = await this.ai.models.generateContent({
      model: this.settings.model,
      contents: [
        {
          role: "user",
          parts: [
            { inlineData: { mimeType: "image/jpeg", data: image.toString("base64") } },
            { text: this.instruction },
          ],
        },
      ],
      config: {
        responseMimeType: "application/json",
        responseSchema: verdictSchema,
        temperature: 0.2,
        abortSignal: options.signal,
      },
    });

    const text = response.text;
    if (!text) {
      throw new MalformedResponseError("Empty response from Gemini");
    }
    return extractJsonObject(text);
  }
}
