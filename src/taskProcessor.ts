import { z } from 'zod';
import { ExecutionDefaults } from './config';
import { EngineCallOutcome, ExecutionEngine } from './engineClient';
import { errorMessage } from './errors';
import { sleep as defaultSleep, Sleep } from './retry';
import { RuntimeRegistry } from './runtimeRegistry';
import type {
  EngineExecuteRequest,
  EngineExecuteResponse,
  ResultMessage,
  ResultStatus,
} from './types';

const BYTES_PER_MB = 1024 * 1024;
const MAX_ERROR_BODY = 500;
const MIN_ENGINE_TIMEOUT_MS = 1000;

const taskSchema = z.object({
  job_id: z.string().min(1),
  code: z.string().min(1),
  language: z.string().min(1),
});

const stageSchema = z.object({
  stdout: z.string().nullish(),
  stderr: z.string().nullish(),
  output: z.string().nullish(),
  code: z.number().nullish(),
  signal: z.string().nullish(),
});

const engineResponseSchema: z.ZodType<EngineExecuteResponse> = z.object({
  language: z.string().optional(),
  version: z.string().optional(),
  compile: stageSchema.nullish(),
  run: stageSchema.nullish(),
});

export interface TaskProcessorOptions {
  engine: ExecutionEngine;
  runtimes: RuntimeRegistry;
  defaults: ExecutionDefaults;
  timeoutMarginMs: number;
  rateLimitRetries: number;
  rateLimitBackoffMs: number;
  sleep?: Sleep;
  logPrefix?: string;
}

export interface ResolvedLimits {
  memoryLimit: number;
  compileTimeout: number;
  runTimeout: number;
}

interface JobContext {
  jobId: string | null;
  language: string;
  version: string | null;
}

/** Integer value of `value`, or `fallback` when it cannot be read as one. */
export function coerceInt(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value === 'string' && /^\s*[-+]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return fallback;
}

/** Like coerceInt, but a negative duration also falls back. */
export function coerceTimeout(value: unknown, fallback: number): number {
  const timeout = coerceInt(value, fallback);
  return timeout >= 0 ? timeout : fallback;
}

export function buildEngineRequest(
  code: string,
  language: string,
  version: string,
  limits: ResolvedLimits
): EngineExecuteRequest {
  const request: EngineExecuteRequest = {
    language,
    version,
    files: [{ content: code }],
    compile_timeout: limits.compileTimeout,
    run_timeout: limits.runTimeout,
  };
  // Negative means unlimited: leave the engine's own limits in place.
  if (limits.memoryLimit >= 0) {
    request.compile_memory_limit = limits.memoryLimit * BYTES_PER_MB;
    request.run_memory_limit = limits.memoryLimit * BYTES_PER_MB;
  }
  return request;
}

function failure(
  context: JobContext,
  status: ResultStatus,
  stderr: string,
  message: string
): ResultMessage {
  return {
    job_id: context.jobId,
    stdout: null,
    stderr,
    compile_output: null,
    compile_stderr: null,
    language: context.language,
    version: context.version,
    status,
    message,
    fail: true,
  };
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}…` : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns one task payload into exactly one ResultMessage. Never throws: every
 * failure, including unexpected ones, becomes a result with `fail: true`.
 */
export class TaskProcessor {
  private readonly options: TaskProcessorOptions;
  private readonly sleep: Sleep;
  private readonly prefix: string;

  constructor(options: TaskProcessorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.prefix = options.logPrefix ?? 'Feeder:';
  }

  async process(payload: unknown): Promise<ResultMessage> {
    const context: JobContext = { jobId: null, language: 'unknown', version: null };
    try {
      return await this.run(payload, context);
    } catch (error) {
      console.error(`${this.prefix} Processing failed for job ${context.jobId}:`, error);
      const text = errorMessage(error);
      return failure(context, 'feeder_processing_error', `Feeder processing error: ${text}`, text);
    }
  }

  private async run(payload: unknown, context: JobContext): Promise<ResultMessage> {
    let body: unknown = payload;
    if (typeof payload === 'string' || Buffer.isBuffer(payload)) {
      try {
        body = JSON.parse(payload.toString());
      } catch {
        console.error(`${this.prefix} Failed to decode task message`);
        return failure(context, 'feeder_error', 'Feeder internal error: Failed to decode message.', 'Invalid message format.');
      }
    }

    if (!isRecord(body)) {
      console.error(`${this.prefix} Task message is not a JSON object`);
      return failure(context, 'feeder_error', 'Feeder internal error: Task message is not an object.', 'Invalid message format.');
    }

    if (typeof body.job_id === 'string' && body.job_id) context.jobId = body.job_id;
    if (typeof body.language === 'string' && body.language) context.language = body.language;

    const parsed = taskSchema.safeParse(body);
    if (!parsed.success) {
      console.warn(`${this.prefix} Task ${context.jobId} is missing job_id, code, or language`);
      return failure(
        context,
        'feeder_error',
        'Feeder internal error: Missing job_id, code, or language.',
        'Invalid message format.'
      );
    }
    const task = parsed.data;

    const { defaults } = this.options;
    const limits: ResolvedLimits = {
      memoryLimit: coerceInt(body.memory_limit, defaults.memoryLimit),
      compileTimeout: coerceTimeout(body.compile_timeout, defaults.compileTimeout),
      runTimeout: coerceTimeout(body.run_timeout, defaults.runTimeout),
    };

    const version = this.options.runtimes.resolve(task.language);
    if (!version) {
      console.warn(`${this.prefix} Job ${task.job_id}: unsupported language '${task.language}'`);
      return failure(
        context,
        'unsupported_language',
        `Language '${task.language}' is not supported by the execution engine.`,
        'Unsupported language.'
      );
    }
    context.version = version;

    const request = buildEngineRequest(task.code, task.language, version, limits);
    // axios reads a timeout of 0 as "wait forever".
    const timeoutMs = Math.max(
      limits.compileTimeout + limits.runTimeout + this.options.timeoutMarginMs,
      MIN_ENGINE_TIMEOUT_MS
    );
    console.log(
      `${this.prefix} Job ${task.job_id}: executing ${task.language} ${version} (memory ${limits.memoryLimit}MB, compile ${limits.compileTimeout}ms, run ${limits.runTimeout}ms)`
    );

    return this.call(request, timeoutMs, context);
  }

  private async call(
    request: EngineExecuteRequest,
    timeoutMs: number,
    context: JobContext
  ): Promise<ResultMessage> {
    const { engine, rateLimitRetries, rateLimitBackoffMs } = this.options;

    let outcome: EngineCallOutcome = await engine.execute(request, timeoutMs);
    if (outcome.kind === 'rate_limited') {
      for (let attempt = 1; attempt <= rateLimitRetries; attempt++) {
        console.warn(`${this.prefix} Job ${context.jobId}: rate limited, retry ${attempt}/${rateLimitRetries}`);
        await this.sleep(attempt * rateLimitBackoffMs);
        outcome = await engine.execute(request, timeoutMs);
        if (outcome.kind === 'rate_limited') continue;
        if (outcome.kind !== 'ok') {
          const detail = describe(outcome);
          console.error(`${this.prefix} Job ${context.jobId}: engine error while retrying: ${detail}`);
          return failure(context, 'piston_api_error_retry', `Piston API error during rate-limit retry: ${detail}`, detail);
        }
        break;
      }
    }

    switch (outcome.kind) {
      case 'ok':
        return this.toResult(outcome.body, context);
      case 'rate_limited':
        console.error(`${this.prefix} Job ${context.jobId}: still rate limited after ${rateLimitRetries} retries`);
        return failure(
          context,
          'piston_rate_limited',
          `Piston API rate limit persisted after ${rateLimitRetries} retries.`,
          'Rate limited by the execution engine.'
        );
      case 'timeout':
        console.error(`${this.prefix} Job ${context.jobId}: engine request timed out after ${timeoutMs}ms`);
        return failure(context, 'piston_timeout', `Piston API request timed out after ${timeoutMs}ms.`, outcome.message);
      case 'connection_error':
        console.error(`${this.prefix} Job ${context.jobId}: engine connection error: ${outcome.message}`);
        return failure(context, 'piston_connection_error', `Piston API connection error: ${outcome.message}`, outcome.message);
      case 'http_error':
        console.error(`${this.prefix} Job ${context.jobId}: engine returned HTTP ${outcome.status}`);
        return failure(
          context,
          `piston_http_error_${outcome.status}`,
          `Piston API returned HTTP ${outcome.status}: ${truncate(outcome.body)}`,
          `HTTP ${outcome.status}`
        );
    }
  }

  private toResult(body: string, context: JobContext): ResultMessage {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      console.error(`${this.prefix} Job ${context.jobId}: engine response is not valid JSON`);
      return failure(context, 'piston_response_error', `Piston API returned invalid JSON: ${errorMessage(error)}`, 'Invalid response from the execution engine.');
    }

    const parsed = engineResponseSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`${this.prefix} Job ${context.jobId}: engine response has an unexpected shape`);
      return failure(context, 'piston_response_error', `Piston API returned an unexpected response: ${truncate(body)}`, 'Invalid response from the execution engine.');
    }

    const { run, compile, version } = parsed.data;
    const status: ResultStatus = run && run.code === 0 ? 'success' : 'error';
    const result: ResultMessage = {
      job_id: context.jobId,
      stdout: run?.stdout ?? null,
      stderr: run?.stderr ?? null,
      compile_output: compile?.output ?? null,
      compile_stderr: compile?.stderr ?? null,
      language: context.language,
      version: version ?? context.version,
      status,
      message: run?.signal || compile?.stderr || run?.stderr || null,
      fail: false,
    };
    console.log(`${this.prefix} Job ${context.jobId}: engine finished with status ${status}`);
    return result;
  }
}

function describe(outcome: Exclude<EngineCallOutcome, { kind: 'ok' } | { kind: 'rate_limited' }>): string {
  switch (outcome.kind) {
    case 'timeout':
      return `timeout (${outcome.message})`;
    case 'connection_error':
      return `connection error (${outcome.message})`;
    case 'http_error':
      return `HTTP ${outcome.status}`;
  }
}

export interface TaskDelivery {
  id?: string | number;
  data: unknown;
}

export interface ResultPublisher {
  publish(result: ResultMessage): Promise<void>;
}

/**
 * Per-delivery handler for the task queue. Its only effects are publishing one
 * result and then returning, which acknowledges the delivery. A failed publish
 * rejects, so the broker keeps the task and delivers it again.
 */
export function createTaskHandler(processor: TaskProcessor, results: ResultPublisher, logPrefix = 'Feeder:') {
  return async (delivery: TaskDelivery): Promise<void> => {
    const result = await processor.process(delivery.data);
    await results.publish(result);
    console.log(`${logPrefix} Job ${result.job_id ?? delivery.id} completed with status ${result.status}`);
  };
}
