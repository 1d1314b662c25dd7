import type { AlertResponse, HealthResponse, StatsResponse, StopResponse } from './types.js';

export interface MonitorClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

type Guard<T> = (value: unknown) => value is T;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isHealth: Guard<HealthResponse> = (value): value is HealthResponse =>
  isRecord(value) && value.status === 'ok' && typeof value.state === 'string';

const isAlert: Guard<AlertResponse> = (value): value is AlertResponse =>
  isRecord(value) &&
  typeof value.level === 'string' &&
  typeof value.message === 'string' &&
  typeof value.sourceFrameSeq === 'number';

const isStats: Guard<StatsResponse> = (value): value is StatsResponse =>
  isRecord(value) && typeof value.frames === 'number' && typeof value.uploadsSubmitted === 'number';

const isStop: Guard<StopResponse> = (value): value is StopResponse =>
  isRecord(value) && typeof value.state === 'string' && typeof value.reason === 'string';

export class MonitorClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: MonitorClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async getHealth(): Promise<HealthResponse> {
    return this.get('health', isHealth);
  }

  async getAlert(): Promise<AlertResponse> {
    return this.get('alert', isAlert);
  }

  async getStats(): Promise<StatsResponse> {
    return this.get('stats', isStats);
  }

  async stop(reason?: string): Promise<StopResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/stop`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
      },
      body: JSON.stringify(reason === undefined ? {} : { reason }),
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`Stop request failed with ${response.status}: ${body}`);
    }

    return this.readJson(response, isStop, 'stop');
  }

  private async get<T>(path: string, guard: Guard<T>): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}/${path}`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new Error(`${capitalize(path)} request failed with ${response.status}: ${body}`);
    }

    return this.readJson(response, guard, path);
  }

  private async readJson<T>(response: Response, guard: Guard<T>, what: string): Promise<T> {
    const payload: unknown = await response.json();
    if (!guard(payload)) {
      throw new Error(`Unexpected ${what} response: ${JSON.stringify(payload)}`);
    }
    return payload;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export * from './types.js';
