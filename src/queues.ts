import Queue from 'bull';
import { BrokerConfig } from './config';
import { BrokerUnavailableError, errorMessage } from './errors';
import { exponentialBackoff, Sleep, withRetry, withTimeout } from './retry';
import { ResultPublisher } from './taskProcessor';
import type { ResultMessage, TaskMessage } from './types';

// A result publish that fails is retried by redelivering the task.
export const TASK_JOB_OPTIONS: Queue.JobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: true,
  removeOnFail: 50,
};

export const RESULT_JOB_OPTIONS: Queue.JobOptions = {
  attempts: 1,
  removeOnComplete: true,
  removeOnFail: 50,
};

export function createQueue<T>(name: string, broker: BrokerConfig): Queue.Queue<T> {
  return new Queue<T>(name, {
    redis: {
      host: broker.redis.host,
      port: broker.redis.port,
      password: broker.redis.password,
      family: 4, // Force IPv4
      connectTimeout: 10000,
    },
  });
}

/** The parts of a Bull queue the connection check and publishers touch. */
export interface BrokerConnection {
  readonly name: string;
  readonly client: {
    readonly status: string;
    ping(): Promise<unknown>;
  };
  isReady(): Promise<unknown>;
}

export interface JobSink<T> {
  readonly client: { readonly status: string };
  add(data: T, opts?: Queue.JobOptions): Promise<unknown>;
}

export function isQueueReady(queue: { readonly client: { readonly status: string } }): boolean {
  return queue.client.status === 'ready';
}

/**
 * Waits until the queue's Redis client answers a PING, retrying with
 * exponential backoff. Throws BrokerUnavailableError once every attempt has
 * timed out or failed.
 */
export async function connectQueue(
  queue: BrokerConnection,
  broker: BrokerConfig,
  logPrefix: string,
  sleep?: Sleep
): Promise<void> {
  try {
    await withRetry(
      () =>
        withTimeout(
          queue.isReady().then(() => queue.client.ping()),
          broker.connectTimeoutMs,
          `Connection to queue ${queue.name}`
        ),
      {
        attempts: broker.connectAttempts,
        delayMs: exponentialBackoff(1000),
        sleep,
        onRetry: (error, attempt, delay) => {
          console.error(
            `${logPrefix} Attempt ${attempt}/${broker.connectAttempts}: failed to reach Redis at ${broker.redis.host}:${broker.redis.port} for queue ${queue.name} - ${errorMessage(error)}. Retrying in ${delay}ms`
          );
        },
      }
    );
  } catch (error) {
    throw new BrokerUnavailableError(
      `Queue ${queue.name} unavailable after ${broker.connectAttempts} attempts: ${errorMessage(error)}`
    );
  }
  console.log(`${logPrefix} Connected to queue ${queue.name} at ${broker.redis.host}:${broker.redis.port}`);
}

export interface TaskPublisher {
  isAvailable(): boolean;
  publish(task: TaskMessage): Promise<void>;
}

export class QueueTaskPublisher implements TaskPublisher {
  private readonly queue: JobSink<TaskMessage>;

  constructor(queue: JobSink<TaskMessage>) {
    this.queue = queue;
  }

  isAvailable(): boolean {
    return isQueueReady(this.queue);
  }

  async publish(task: TaskMessage): Promise<void> {
    await this.queue.add(task, { ...TASK_JOB_OPTIONS, jobId: task.job_id });
  }
}

export class QueueResultPublisher implements ResultPublisher {
  private readonly queue: JobSink<ResultMessage>;

  constructor(queue: JobSink<ResultMessage>) {
    this.queue = queue;
  }

  async publish(result: ResultMessage): Promise<void> {
    await this.queue.add(result, RESULT_JOB_OPTIONS);
  }
}
