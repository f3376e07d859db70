import 'dotenv/config';
import http from 'http';
import Queue from 'bull';
import { createApp } from './app';
import { CompletionRegistry } from './completionRegistry';
import { loadSchedulerConfig, SchedulerConfig } from './config';
import { initSchedulerCrypto } from './crypto';
import { BrokerUnavailableError } from './errors';
import { connectQueue, createQueue, QueueTaskPublisher } from './queues';
import { ResultConsumer } from './resultConsumer';
import type { ResultMessage, TaskMessage } from './types';

let server: http.Server | undefined;
let taskQueue: Queue.Queue<TaskMessage> | undefined;
let resultQueue: Queue.Queue<unknown> | undefined;
const pending = new CompletionRegistry<ResultMessage>();

function watchQueue<T>(queue: Queue.Queue<T>): void {
  queue.on('error', (error: Error) => {
    console.error(`Scheduler: Queue ${queue.name} error:`, error.message);
  });
}

const startServer = async (config: SchedulerConfig): Promise<void> => {
  const crypto = initSchedulerCrypto(config);

  taskQueue = createQueue<TaskMessage>(config.broker.taskQueue, config.broker);
  resultQueue = createQueue<unknown>(config.broker.resultsQueue, config.broker);
  watchQueue(taskQueue);
  watchQueue(resultQueue);

  const consumer = new ResultConsumer(pending);
  // Registered whether or not Redis is reachable yet, so outstanding jobs
  // still resolve once the connection comes back.
  resultQueue
    .process(async (job: Queue.Job<unknown>) => {
      consumer.handle(job.data);
    })
    .catch((error: unknown) => {
      console.error('Scheduler: Results consumer stopped:', error);
    });
  console.log(`Scheduler: Results consumer started on queue: ${config.broker.resultsQueue}`);

  try {
    await connectQueue(taskQueue, config.broker, 'Scheduler:');
  } catch (error) {
    if (!(error instanceof BrokerUnavailableError)) throw error;
    console.error(`Scheduler: ${error.message}. Submissions will be rejected until the broker is reachable.`);
  }

  const app = createApp({
    publisher: new QueueTaskPublisher(taskQueue),
    pending,
    crypto,
    executionTimeoutMs: config.executionTimeoutMs,
    bodyLimit: config.bodyLimit,
    rateLimit: config.rateLimit,
  });

  server = app.listen(config.port, () => {
    console.log(`Scheduler running on port ${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });
};

const closeQueues = async (): Promise<void> => {
  await Promise.all([taskQueue?.close(), resultQueue?.close()]);
};

const gracefulShutdown = () => {
  console.log('Scheduler: Received shutdown signal, closing gracefully.');
  const cancelled = pending.cancelAll('scheduler shutting down');
  if (cancelled > 0) {
    console.log(`Scheduler: Released ${cancelled} pending submissions.`);
  }

  const finish = () => {
    closeQueues()
      .then(() => {
        console.log('Scheduler: Queues closed.');
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Scheduler: Error during shutdown:', error);
        process.exit(1);
      });
  };

  if (server) {
    server.close(() => {
      console.log('Scheduler: HTTP server closed.');
      finish();
    });
  } else {
    finish();
  }
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);

const main = async (): Promise<void> => startServer(loadSchedulerConfig());

main().catch((error: unknown) => {
  console.error('Scheduler: Failed to start:', error);
  process.exit(1);
});
