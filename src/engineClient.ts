import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { EngineError, errorMessage } from './errors';
import type { EngineExecuteRequest, EngineRuntime } from './types';

const RUNTIMES_TIMEOUT_MS = 10_000;

const runtimesSchema = z.array(
  z.object({
    language: z.string().min(1),
    version: z.string().min(1),
    aliases: z.array(z.string()).default([]),
  })
);

/**
 * What came back from one POST /execute. Transport failures are values, not
 * exceptions, so callers can map each one to a result status.
 */
export type EngineCallOutcome =
  | { kind: 'ok'; status: number; body: string }
  | { kind: 'rate_limited' }
  | { kind: 'http_error'; status: number; body: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'connection_error'; message: string };

export interface ExecutionEngine {
  runtimes(): Promise<EngineRuntime[]>;
  execute(request: EngineExecuteRequest, timeoutMs: number): Promise<EngineCallOutcome>;
}

export interface PistonClientOptions {
  baseUrl: string;
  /** Replaces the HTTP transport; tests use this to answer in-process. */
  adapter?: AxiosAdapter;
}

function rawBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

function isTimeout(error: AxiosError): boolean {
  return error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT;
}

export class PistonClient implements ExecutionEngine {
  private readonly http: AxiosInstance;

  constructor(options: PistonClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      headers: { 'Content-Type': 'application/json' },
      // Bodies are parsed by the caller so malformed JSON can be told apart.
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async runtimes(): Promise<EngineRuntime[]> {
    const response = await this.http.get<unknown>('/runtimes', { timeout: RUNTIMES_TIMEOUT_MS });
    if (response.status < 200 || response.status >= 300) {
      throw new EngineError(`GET /runtimes returned HTTP ${response.status}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody(response.data));
    } catch (error) {
      throw new EngineError(`GET /runtimes returned invalid JSON: ${errorMessage(error)}`);
    }

    const runtimes = runtimesSchema.safeParse(parsed);
    if (!runtimes.success) {
      throw new EngineError(`GET /runtimes returned an unexpected shape: ${runtimes.error.message}`);
    }
    return runtimes.data;
  }

  async execute(request: EngineExecuteRequest, timeoutMs: number): Promise<EngineCallOutcome> {
    try {
      const response = await this.http.post<unknown>('/execute', request, { timeout: timeoutMs });
      const body = rawBody(response.data);

      if (response.status === 429) {
        return { kind: 'rate_limited' };
      }
      if (response.status < 200 || response.status >= 300) {
        return { kind: 'http_error', status: response.status, body };
      }
      return { kind: 'ok', status: response.status, body };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        return isTimeout(error)
          ? { kind: 'timeout', message: error.message }
          : { kind: 'connection_error', message: error.message };
      }
      throw error;
    }
  }
}
