import { z } from 'zod';
import { CompletionRegistry } from './completionRegistry';
import type { ResultMessage, ResultStatus } from './types';

const KNOWN_STATUSES: readonly string[] = [
  'success',
  'error',
  'unsupported_language',
  'piston_timeout',
  'piston_connection_error',
  'piston_rate_limited',
  'piston_api_error_retry',
  'piston_response_error',
  'feeder_error',
  'feeder_processing_error',
];

export function isResultStatus(value: unknown): value is ResultStatus {
  return (
    typeof value === 'string' &&
    (KNOWN_STATUSES.includes(value) || /^piston_http_error_\d+$/.test(value))
  );
}

const nullableText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const resultSchema = z.object({
  job_id: z.string().min(1),
  stdout: nullableText,
  stderr: nullableText,
  compile_output: nullableText,
  compile_stderr: nullableText,
  language: z.string().default('unknown'),
  version: nullableText,
  status: z.custom<ResultStatus>(isResultStatus, { message: 'Unknown result status' }),
  message: nullableText,
  fail: z.boolean().default(false),
});

export type ResultOutcome = 'resolved' | 'unknown_job' | 'malformed';

/**
 * Matches results from the results queue to pending submissions. Every
 * delivery is acknowledged: unknown ids and malformed payloads are logged and
 * dropped, never requeued.
 */
export class ResultConsumer {
  private readonly pending: CompletionRegistry<ResultMessage>;

  constructor(pending: CompletionRegistry<ResultMessage>) {
    this.pending = pending;
  }

  handle(payload: unknown): ResultOutcome {
    let body: unknown = payload;
    if (typeof payload === 'string' || Buffer.isBuffer(payload)) {
      try {
        body = JSON.parse(payload.toString());
      } catch {
        console.error('Scheduler: Failed to decode JSON message from results queue');
        return 'malformed';
      }
    }

    const parsed = resultSchema.safeParse(body);
    if (!parsed.success) {
      console.error(`Scheduler: Dropping malformed result message: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return 'malformed';
    }

    const result = parsed.data;
    if (!this.pending.resolve(result.job_id, result)) {
      console.warn(`Scheduler: Received result for unknown or expired job ID: ${result.job_id}. Skipping.`);
      return 'unknown_job';
    }

    console.log(`Scheduler: Received result for job ID: ${result.job_id} (${result.status})`);
    return 'resolved';
  }
}
