import 'dotenv/config';
import Queue from 'bull';
import { FeederConfig, loadFeederConfig } from './config';
import { PistonClient } from './engineClient';
import { connectQueue, createQueue, QueueResultPublisher } from './queues';
import { RuntimeRegistry } from './runtimeRegistry';
import { createTaskHandler, TaskProcessor } from './taskProcessor';
import type { ResultMessage } from './types';

const feederId = process.env.FEEDER_ID || 'feeder';
const prefix = `Feeder ${feederId}:`;

let taskQueue: Queue.Queue<unknown> | undefined;
let resultQueue: Queue.Queue<ResultMessage> | undefined;

function watchTaskQueue(queue: Queue.Queue<unknown>): void {
  queue.on('error', (error: Error) => {
    console.error(`${prefix} Queue ${queue.name} error:`, error.message);
  });

  queue.on('active', (job: Queue.Job<unknown>) => {
    console.log(`${prefix} Job ${job.id} started processing`);
  });

  queue.on('failed', (job: Queue.Job<unknown>, err: Error) => {
    console.error(`${prefix} Job ${job.id} failed (attempt ${job.attemptsMade}):`, err.message);
  });

  queue.on('stalled', (job: Queue.Job<unknown>) => {
    console.warn(`${prefix} Job ${job.id} stalled and will be redelivered`);
  });
}

const startWorker = async (config: FeederConfig): Promise<void> => {
  console.log(`${prefix} Starting, execution engine at ${config.pistonUrl}`);

  const engine = new PistonClient({ baseUrl: config.pistonUrl });
  const runtimes = await RuntimeRegistry.load(engine, {
    attempts: config.engineConnectAttempts,
    logPrefix: prefix,
  });

  taskQueue = createQueue<unknown>(config.broker.taskQueue, config.broker);
  resultQueue = createQueue<ResultMessage>(config.broker.resultsQueue, config.broker);
  watchTaskQueue(taskQueue);
  resultQueue.on('error', (error: Error) => {
    console.error(`${prefix} Queue ${config.broker.resultsQueue} error:`, error.message);
  });

  await connectQueue(resultQueue, config.broker, prefix);
  await connectQueue(taskQueue, config.broker, prefix);

  const processor = new TaskProcessor({
    engine,
    runtimes,
    defaults: config.defaults,
    timeoutMarginMs: config.engineTimeoutMarginMs,
    rateLimitRetries: config.rateLimitRetries,
    rateLimitBackoffMs: config.rateLimitBackoffMs,
    logPrefix: prefix,
  });
  const handler = createTaskHandler(processor, new QueueResultPublisher(resultQueue), prefix);

  // Concurrency bounds in-flight engine calls; Bull hands out no more jobs until one finishes.
  taskQueue.process(config.prefetchCount, handler).catch((error: unknown) => {
    console.error(`${prefix} Task consumer stopped:`, error);
    process.exit(1);
  });

  console.log(`${prefix} Worker started, listening for jobs on queue: ${config.broker.taskQueue} (concurrency ${config.prefetchCount})`);
};

// Graceful shutdown
const gracefulShutdown = async () => {
  console.log(`${prefix} Shutting down gracefully...`);

  try {
    await Promise.all([taskQueue?.close(), resultQueue?.close()]);
    console.log(`${prefix} Shutdown complete`);
    process.exit(0);
  } catch (error) {
    console.error(`${prefix} Error during shutdown:`, error);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void gracefulShutdown());
process.on('SIGINT', () => void gracefulShutdown());

const main = async (): Promise<void> => startWorker(loadFeederConfig());

main().catch((error: unknown) => {
  console.error(`${prefix} Failed to start worker:`, error);
  process.exit(1);
});
