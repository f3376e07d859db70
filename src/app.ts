import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CompletionRegistry } from './completionRegistry';
import { SchedulerCrypto } from './crypto';
import {
  CompletionCancelledError,
  CompletionTimeoutError,
  errorMessage,
  SettingsError,
} from './errors';
import { TaskPublisher } from './queues';
import type {
  ErrorResponse,
  ExecutionOverrides,
  HealthResponse,
  ResultMessage,
  SubmitRequest,
  SubmitResponse,
  TaskMessage,
} from './types';

const MISSING_FIELDS = "Missing 'code' or 'language' in request body.";

const submitSchema: z.ZodType<SubmitRequest, z.ZodTypeDef, unknown> = z.object(
  {
    code: z.string({ required_error: MISSING_FIELDS, invalid_type_error: MISSING_FIELDS }).min(1, MISSING_FIELDS),
    language: z
      .string({ required_error: MISSING_FIELDS, invalid_type_error: MISSING_FIELDS })
      .min(1, MISSING_FIELDS),
    settings: z.string({ invalid_type_error: 'Settings must be a string.' }).nullish(),
  },
  { invalid_type_error: 'Request body must be a JSON object.', required_error: MISSING_FIELDS }
);

export interface AppDependencies {
  publisher: TaskPublisher;
  pending: CompletionRegistry<ResultMessage>;
  crypto: SchedulerCrypto;
  executionTimeoutMs: number;
  bodyLimit?: string;
  rateLimit?: {
    windowMs: number;
    max: number;
  };
  generateId?: () => string;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function createApp(deps: AppDependencies): express.Express {
  const { publisher, pending, crypto, executionTimeoutMs } = deps;
  const generateId = deps.generateId ?? uuidv4;
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: deps.bodyLimit ?? '1mb' }));
  app.set('trust proxy', 1);

  const limiter = rateLimit({
    windowMs: deps.rateLimit?.windowMs ?? 15 * 60 * 1000,
    limit: deps.rateLimit?.max ?? 200,
    message: { error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.get('/health', (req: Request, res: Response<HealthResponse>) => {
    const connected = publisher.isAvailable();
    res.status(connected ? 200 : 503).json({
      status: connected ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      broker: connected ? 'connected' : 'disconnected',
      crypto: crypto.settings && crypto.signer ? 'configured' : 'missing',
      pending: pending.size,
    });
  });

  app.post('/submit', limiter, async (req: Request, res: Response<SubmitResponse | ErrorResponse>) => {
    const { settings: cipher, signer } = crypto;
    if (!cipher || !signer) {
      console.error('Scheduler: Encryption or signature key is not set.');
      return res.status(500).json({ error: 'Server is not configured with necessary security keys.' });
    }

    if (!publisher.isAvailable()) {
      console.error('Scheduler: Broker is not available for publishing.');
      return res.status(503).json({ error: 'Scheduler is not connected to the broker for publishing.' });
    }

    const body = submitSchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: body.error.issues[0]?.message ?? MISSING_FIELDS });
    }
    const { code, language, settings } = body.data;

    let overrides: ExecutionOverrides = {};
    if (typeof settings === 'string') {
      try {
        overrides = cipher.decrypt(settings);
      } catch (error) {
        if (error instanceof SettingsError) {
          console.warn(`Scheduler: Rejected settings (${error.kind}): ${error.message}`);
          return res.status(400).json({ error: `Invalid or unprocessable settings: ${error.message}` });
        }
        console.error('Scheduler: Unexpected error while processing settings:', error);
        return res.status(500).json({ error: 'An unexpected error occurred during settings processing.' });
      }
    }

    const jobId = generateId();
    const task: TaskMessage = { job_id: jobId, code, language, ...overrides };
    const handle = pending.register(jobId);

    try {
      await publisher.publish(task);
    } catch (error) {
      pending.cancel(jobId, 'publish failed');
      console.error(`Scheduler: Failed to publish job ${jobId}:`, error);
      return res.status(503).json({ error: 'Failed to publish the task to the broker.' });
    }
    console.log(`Scheduler: Job ${jobId} queued (${language})`);

    try {
      const result = await handle.wait(executionTimeoutMs);
      return res.json({ flag: signer.sign(result.stdout) });
    } catch (error) {
      if (error instanceof CompletionTimeoutError) {
        console.warn(`Scheduler: Execution timed out for job ID: ${jobId}`);
        return res.status(504).json({
          error: `Code execution timed out after ${executionTimeoutMs / 1000} seconds.`,
        });
      }
      if (error instanceof CompletionCancelledError) {
        return res.status(503).json({ error: 'Scheduler is shutting down.' });
      }
      pending.cancel(jobId);
      console.error(`Scheduler: Error while waiting for job ${jobId}:`, error);
      return res.status(500).json({ error: `An error occurred while waiting for the execution result: ${errorMessage(error)}` });
    }
  });

  app.use((req: Request, res: Response<ErrorResponse>) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
    const status = httpStatusOf(error);
    if (status !== undefined && status >= 400 && status < 500) {
      return res.status(status).json({
        error: status === 400 ? 'Invalid JSON request body.' : errorMessage(error),
      });
    }
    console.error('Scheduler: Unhandled error:', error);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
