import { describe, expect, it } from 'vitest';
import type { ExecutionEngine } from '../src/engineClient';
import { RuntimeRegistry } from '../src/runtimeRegistry';
import {
  buildEngineRequest,
  coerceInt,
  coerceTimeout,
  createTaskHandler,
  TaskProcessor,
  TaskProcessorOptions,
} from '../src/taskProcessor';
import type { ResultMessage } from '../src/types';
import { C_RUNTIME, EngineReply, fakeEngine, ok, PYTHON_RUNTIME, rateLimited } from './helpers/fakeEngine';

const runtimes = new RuntimeRegistry([PYTHON_RUNTIME, C_RUNTIME]);
const defaults = { memoryLimit: -1, compileTimeout: 10_000, runTimeout: 3000 };

const HELLO_TASK = { job_id: 'job-1', code: 'print("hi")', language: 'python' };
const HELLO_RESPONSE = {
  language: 'python',
  version: '3.10.0',
  run: { stdout: 'hi\n', stderr: '', output: 'hi\n', code: 0, signal: null },
};

function setup(execute: EngineReply[], overrides: Partial<TaskProcessorOptions> = {}) {
  const engine = fakeEngine({ execute });
  const delays: number[] = [];
  const processor = new TaskProcessor({
    engine: engine.client,
    runtimes,
    defaults,
    timeoutMarginMs: 5000,
    rateLimitRetries: 10,
    rateLimitBackoffMs: 10,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  });
  return { processor, delays, executeCalls: engine.executeCalls };
}

describe('coerceInt', () => {
  it('reads integers from numbers and numeric strings', () => {
    expect(coerceInt(512, 0)).toBe(512);
    expect(coerceInt(12.9, 0)).toBe(12);
    expect(coerceInt(' 2000 ', 0)).toBe(2000);
    expect(coerceInt('-1', 0)).toBe(-1);
  });

  it('falls back for anything else', () => {
    expect(coerceInt('lots', 7)).toBe(7);
    expect(coerceInt('1.5', 7)).toBe(7);
    expect(coerceInt(null, 7)).toBe(7);
    expect(coerceInt(Number.NaN, 7)).toBe(7);
    expect(coerceInt(true, 7)).toBe(7);
  });
});

describe('coerceTimeout', () => {
  it('keeps zero and positive durations', () => {
    expect(coerceTimeout(0, 5)).toBe(0);
    expect(coerceTimeout('2500', 5)).toBe(2500);
  });

  it('falls back for negative durations', () => {
    expect(coerceTimeout(-1, 5)).toBe(5);
    expect(coerceTimeout('-3000', 5)).toBe(5);
  });
});

describe('buildEngineRequest', () => {
  it('converts the memory limit from MB to bytes for both stages', () => {
    expect(buildEngineRequest('x', 'c', '10.2.0', { memoryLimit: 256, compileTimeout: 1, runTimeout: 2 })).toEqual({
      language: 'c',
      version: '10.2.0',
      files: [{ content: 'x' }],
      compile_timeout: 1,
      run_timeout: 2,
      compile_memory_limit: 268_435_456,
      run_memory_limit: 268_435_456,
    });
  });

  it('omits memory limits when unlimited', () => {
    const request = buildEngineRequest('x', 'c', '10.2.0', { memoryLimit: -1, compileTimeout: 1, runTimeout: 2 });
    expect(request).not.toHaveProperty('compile_memory_limit');
    expect(request).not.toHaveProperty('run_memory_limit');
  });
});

describe('TaskProcessor', () => {
  it('runs a task and normalizes a successful execution', async () => {
    const { processor, executeCalls } = setup([ok(HELLO_RESPONSE)]);

    const result = await processor.process(HELLO_TASK);

    expect(result).toEqual<ResultMessage>({
      job_id: 'job-1',
      stdout: 'hi\n',
      stderr: '',
      compile_output: null,
      compile_stderr: null,
      language: 'python',
      version: '3.10.0',
      status: 'success',
      message: null,
      fail: false,
    });
    expect(executeCalls()).toEqual([
      {
        method: 'post',
        url: '/execute',
        body: {
          language: 'python',
          version: '3.10.0',
          files: [{ content: 'print("hi")' }],
          compile_timeout: 10_000,
          run_timeout: 3000,
        },
        timeout: 18_000,
      },
    ]);
  });

  it('accepts the task as a JSON string', async () => {
    const { processor } = setup([ok(HELLO_RESPONSE)]);
    const result = await processor.process(JSON.stringify(HELLO_TASK));
    expect(result.status).toBe('success');
    expect(result.stdout).toBe('hi\n');
  });

  it('resolves aliases and applies per-task limits', async () => {
    const { processor, executeCalls } = setup([ok(HELLO_RESPONSE)]);

    await processor.process({
      job_id: 'job-2',
      code: 'print(1)',
      language: 'PY3',
      memory_limit: 64,
      compile_timeout: '2000',
      run_timeout: 1500.7,
    });

    expect(executeCalls()[0]).toEqual({
      method: 'post',
      url: '/execute',
      body: {
        language: 'PY3',
        version: '3.10.0',
        files: [{ content: 'print(1)' }],
        compile_timeout: 2000,
        run_timeout: 1500,
        compile_memory_limit: 67_108_864,
        run_memory_limit: 67_108_864,
      },
      timeout: 8500,
    });
  });

  it('falls back to defaults for limits it cannot read', async () => {
    const { processor, executeCalls } = setup([ok(HELLO_RESPONSE)]);
    await processor.process({ ...HELLO_TASK, memory_limit: 'lots', run_timeout: null });
    expect(executeCalls()[0]?.body).toEqual({
      language: 'python',
      version: '3.10.0',
      files: [{ content: 'print("hi")' }],
      compile_timeout: 10_000,
      run_timeout: 3000,
    });
  });

  it('uses default timeouts when the task carries negative ones', async () => {
    const { processor, executeCalls } = setup([ok(HELLO_RESPONSE)]);
    await processor.process({ ...HELLO_TASK, compile_timeout: -20_000, run_timeout: '-1' });
    expect(executeCalls()[0]).toMatchObject({
      body: { compile_timeout: 10_000, run_timeout: 3000 },
      timeout: 18_000,
    });
  });

  it('never hands the engine client a zero timeout', async () => {
    const { processor, executeCalls } = setup([ok(HELLO_RESPONSE)], { timeoutMarginMs: 0 });
    await processor.process({ ...HELLO_TASK, compile_timeout: 0, run_timeout: 0 });
    expect(executeCalls()[0]).toMatchObject({
      body: { compile_timeout: 0, run_timeout: 0 },
      timeout: 1000,
    });
  });

  it('reports a non-zero exit as an error with the runtime stderr as message', async () => {
    const { processor } = setup([
      ok({ language: 'python', version: '3.10.0', run: { stdout: '', stderr: 'Traceback', code: 1, signal: null } }),
    ]);
    const result = await processor.process(HELLO_TASK);
    expect(result).toMatchObject({ status: 'error', stdout: '', stderr: 'Traceback', message: 'Traceback', fail: false });
  });

  it('prefers the signal as message when the run was killed', async () => {
    const { processor } = setup([
      ok({ language: 'python', version: '3.10.0', run: { stdout: '', stderr: 'partial', code: null, signal: 'SIGKILL' } }),
    ]);
    const result = await processor.process(HELLO_TASK);
    expect(result).toMatchObject({ status: 'error', message: 'SIGKILL', fail: false });
  });

  it('reports compile failures without a run stage', async () => {
    const { processor } = setup([
      ok({
        language: 'c',
        version: '10.2.0',
        compile: { stdout: '', stderr: 'error: expected ;', output: 'error: expected ;', code: 1, signal: null },
      }),
    ]);

    const result = await processor.process({ job_id: 'job-3', code: 'int main(){}', language: 'c' });

    expect(result).toEqual<ResultMessage>({
      job_id: 'job-3',
      stdout: null,
      stderr: null,
      compile_output: 'error: expected ;',
      compile_stderr: 'error: expected ;',
      language: 'c',
      version: '10.2.0',
      status: 'error',
      message: 'error: expected ;',
      fail: false,
    });
  });

  it('rejects unsupported languages without calling the engine', async () => {
    const { processor, executeCalls } = setup([]);

    const result = await processor.process({ job_id: 'job-4', code: '+++', language: 'brainfudge' });

    expect(result).toEqual<ResultMessage>({
      job_id: 'job-4',
      stdout: null,
      stderr: "Language 'brainfudge' is not supported by the execution engine.",
      compile_output: null,
      compile_stderr: null,
      language: 'brainfudge',
      version: null,
      status: 'unsupported_language',
      message: 'Unsupported language.',
      fail: true,
    });
    expect(executeCalls()).toHaveLength(0);
  });

  describe('malformed tasks', () => {
    it('reports undecodable payloads', async () => {
      const { processor } = setup([]);
      await expect(processor.process('{not json')).resolves.toEqual({
        job_id: null,
        stdout: null,
        stderr: 'Feeder internal error: Failed to decode message.',
        compile_output: null,
        compile_stderr: null,
        language: 'unknown',
        version: null,
        status: 'feeder_error',
        message: 'Invalid message format.',
        fail: true,
      });
    });

    it('reports payloads that are not objects', async () => {
      const { processor } = setup([]);
      const result = await processor.process('[1,2]');
      expect(result).toMatchObject({
        job_id: null,
        status: 'feeder_error',
        stderr: 'Feeder internal error: Task message is not an object.',
      });
    });

    it('keeps the job id when a field is missing', async () => {
      const { processor } = setup([]);
      const result = await processor.process({ job_id: 'job-5', language: 'python' });
      expect(result).toMatchObject({
        job_id: 'job-5',
        language: 'python',
        status: 'feeder_error',
        stderr: 'Feeder internal error: Missing job_id, code, or language.',
        message: 'Invalid message format.',
        fail: true,
      });
    });
  });

  describe('rate limiting', () => {
    it('retries with a linearly growing sleep until the engine accepts', async () => {
      const { processor, delays, executeCalls } = setup([rateLimited(), rateLimited(), ok(HELLO_RESPONSE)]);

      const result = await processor.process(HELLO_TASK);

      expect(result.status).toBe('success');
      expect(executeCalls()).toHaveLength(3);
      expect(delays).toEqual([10, 20]);
    });

    it('gives up after the configured number of retries', async () => {
      const replies = Array.from({ length: 11 }, () => rateLimited());
      const { processor, delays, executeCalls } = setup(replies);

      const result = await processor.process(HELLO_TASK);

      expect(result).toEqual<ResultMessage>({
        job_id: 'job-1',
        stdout: null,
        stderr: 'Piston API rate limit persisted after 10 retries.',
        compile_output: null,
        compile_stderr: null,
        language: 'python',
        version: '3.10.0',
        status: 'piston_rate_limited',
        message: 'Rate limited by the execution engine.',
        fail: true,
      });
      expect(executeCalls()).toHaveLength(11);
      expect(delays).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    });

    it('stops retrying on a different failure', async () => {
      const { processor, executeCalls } = setup([rateLimited(), { status: 500, body: 'down' }]);

      const result = await processor.process(HELLO_TASK);

      expect(result).toMatchObject({
        status: 'piston_api_error_retry',
        stderr: 'Piston API error during rate-limit retry: HTTP 500',
        message: 'HTTP 500',
        fail: true,
      });
      expect(executeCalls()).toHaveLength(2);
    });

    it('makes a single call when retries are disabled', async () => {
      const { processor, executeCalls } = setup([rateLimited()], { rateLimitRetries: 0 });
      const result = await processor.process(HELLO_TASK);
      expect(result.status).toBe('piston_rate_limited');
      expect(result.stderr).toBe('Piston API rate limit persisted after 0 retries.');
      expect(executeCalls()).toHaveLength(1);
    });
  });

  describe('engine failures', () => {
    it('maps timeouts', async () => {
      const { processor } = setup([{ fail: 'timeout' }]);
      const result = await processor.process(HELLO_TASK);
      expect(result).toMatchObject({
        status: 'piston_timeout',
        stderr: 'Piston API request timed out after 18000ms.',
        message: 'timeout of 18000ms exceeded',
        version: '3.10.0',
        fail: true,
      });
    });

    it('maps connection errors', async () => {
      const { processor } = setup([{ fail: 'connection' }]);
      const result = await processor.process(HELLO_TASK);
      expect(result).toMatchObject({
        status: 'piston_connection_error',
        stderr: 'Piston API connection error: connect ECONNREFUSED 127.0.0.1:2000',
        message: 'connect ECONNREFUSED 127.0.0.1:2000',
        fail: true,
      });
    });

    it('maps other HTTP statuses into the status name', async () => {
      const { processor } = setup([{ status: 503, body: 'maintenance' }]);
      const result = await processor.process(HELLO_TASK);
      expect(result).toMatchObject({
        status: 'piston_http_error_503',
        stderr: 'Piston API returned HTTP 503: maintenance',
        message: 'HTTP 503',
        fail: true,
      });
    });

    it('maps bodies that are not JSON', async () => {
      const { processor } = setup([ok('Bad Gateway')]);
      const result = await processor.process(HELLO_TASK);
      expect(result).toMatchObject({
        status: 'piston_response_error',
        message: 'Invalid response from the execution engine.',
        fail: true,
      });
    });

    it('maps JSON of the wrong shape', async () => {
      const { processor } = setup([ok({ run: 'nope' })]);
      const result = await processor.process(HELLO_TASK);
      expect(result.status).toBe('piston_response_error');
    });

    it('turns unexpected exceptions into a processing error', async () => {
      const engine: ExecutionEngine = {
        runtimes: async () => [],
        execute: async () => {
          throw new Error('socket exploded');
        },
      };
      const processor = new TaskProcessor({
        engine,
        runtimes,
        defaults,
        timeoutMarginMs: 5000,
        rateLimitRetries: 10,
        rateLimitBackoffMs: 0,
      });

      await expect(processor.process(HELLO_TASK)).resolves.toEqual({
        job_id: 'job-1',
        stdout: null,
        stderr: 'Feeder processing error: socket exploded',
        compile_output: null,
        compile_stderr: null,
        language: 'python',
        version: '3.10.0',
        status: 'feeder_processing_error',
        message: 'socket exploded',
        fail: true,
      });
    });
  });
});

describe('createTaskHandler', () => {
  it('publishes exactly one result per delivery', async () => {
    const { processor } = setup([ok(HELLO_RESPONSE)]);
    const published: ResultMessage[] = [];
    const handler = createTaskHandler(processor, {
      publish: async (result) => {
        published.push(result);
      },
    });

    await handler({ id: 'job-1', data: HELLO_TASK });

    expect(published).toHaveLength(1);
    expect(published[0]).toMatchObject({ job_id: 'job-1', status: 'success', stdout: 'hi\n' });
  });

  it('publishes failure results too', async () => {
    const { processor } = setup([]);
    const published: ResultMessage[] = [];
    const handler = createTaskHandler(processor, {
      publish: async (result) => {
        published.push(result);
      },
    });

    await handler({ id: 7, data: 'garbage' });

    expect(published.map((result) => result.status)).toEqual(['feeder_error']);
  });

  it('rejects when the result cannot be published so the task is redelivered', async () => {
    const { processor } = setup([ok(HELLO_RESPONSE)]);
    const handler = createTaskHandler(processor, {
      publish: async () => {
        throw new Error('redis down');
      },
    });

    await expect(handler({ id: 'job-1', data: HELLO_TASK })).rejects.toThrow('redis down');
  });
});
