export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceUnavailableError extends MonitorError {}

export class ReadError extends MonitorError {}

export class EndOfStreamError extends MonitorError {
  constructor(message = "end of stream") {
    super(message);
  }
}

export class ModelLoadError extends MonitorError {}

export class NetworkError extends MonitorError {
  public readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class AnalyzerTimeoutError extends MonitorError {
  constructor(public readonly timeoutMs: number) {
    super(`analyzer request timed out after ${timeoutMs}ms`);
  }
}

export class MalformedResponseError extends MonitorError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
