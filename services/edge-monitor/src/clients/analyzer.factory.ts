import type { MonitorConfig } from "../config.js";
import type { AnalyzerClient } from "./analyzer.client.js";
import { GeminiAnalyzerClient } from "./gemini.client.js";
import { RemoteAnalyzerClient } from "./remote-analyzer.client.js";

export function createAnalyzerClient(config: MonitorConfig["analyzer"]): AnalyzerClient {
  switch (config.provider) {
    case "gemini": {
      if (!config.gemini.apiKey) {
        throw new Error("GEMINI_API_KEY is required when ANALYZER_PROVIDER=gemini");
      }
      return new GeminiAnalyzerClient({
        apiKey: config.gemini.apiKey,
        model: config.gemini.model,
        instruction: config.instruction,
      });
    }
    case "remote": {
      if (!config.url) {
        throw new Error("ANALYZER_URL is required when ANALYZER_PROVIDER=remote");
      }
      return new RemoteAnalyzerClient({ url: config.url, instruction: config.instruction });
    }
    default: {
      const unsupported: never = config.provider;
      throw new Error(`Unsupported analyzer provider: ${String(unsupported)}`);
    }
  }
}
