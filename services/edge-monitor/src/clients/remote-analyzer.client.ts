import fetch, { type Response } from "node-fetch";
import { z } from "zod";

import { MalformedResponseError, NetworkError, describeError } from "../errors.js";
import type { AnalyzeOptions, AnalyzerClient } from "./analyzer.client.js";
import { DEFAULT_INSTRUCTION, extractJsonObject, isJsonObject } from "./analyzer.client.js";

const chatReplySchema = z.object({
  response: z.string(),
});

export interface RemoteAnalyzerSettings {
  url: string;
  instruction?: string;
}

/** Self-hosted vision-language server speaking `POST {image_base64, query} → {response}`. */
export class RemoteAnalyzerClient implements AnalyzerClient {
  readonly name = "remote";
  private readonly instruction: string;

  constructor(private readonly settings: RemoteAnalyzerSettings) {
    this.instruction = settings.instruction ?? DEFAULT_INSTRUCTION;
  }

  async analyze(image: Buffer, options: AnalyzeOptions): Promise<unknown> {
    const body = await this.post(
      {
        image_base64: image.toString("base64"),
        query: this.instruction,
      },
      options.signal,
    );

    const reply = chatReplySchema.safeParse(body);
    if (reply.success) {
      return extractJsonObject(reply.data.response);
    }
    // Some deployments answer with the verdict object directly.
    if (isJsonObject(body)) {
      return body;
    }
    throw new MalformedResponseError("analyzer reply has neither a response text nor a verdict object");
  }

  private async post(payload: unknown, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.settings.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new NetworkError(`Analyzer request failed: ${describeError(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new NetworkError(`Analyzer request failed: ${response.status} ${text}`, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new MalformedResponseError("Analyzer returned a non-JSON body", { cause: error });
    }
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
