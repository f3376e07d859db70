export interface ExecutionOverrides {
  memory_limit?: number; // MB, -1 = unlimited
  compile_timeout?: number; // ms
  run_timeout?: number; // ms
}

export interface TaskMessage extends ExecutionOverrides {
  job_id: string;
  code: string;
  language: string;
}

export type ResultStatus =
  | 'success'
  | 'error'
  | 'unsupported_language'
  | 'piston_timeout'
  | 'piston_connection_error'
  | `piston_http_error_${number}`
  | 'piston_rate_limited'
  | 'piston_api_error_retry'
  | 'piston_response_error'
  | 'feeder_error'
  | 'feeder_processing_error';

export interface ResultMessage {
  job_id: string | null;
  stdout: string | null;
  stderr: string | null;
  compile_output: string | null;
  compile_stderr: string | null;
  language: string;
  version: string | null;
  status: ResultStatus;
  message: string | null;
  fail: boolean;
}

export interface SubmitRequest {
  code: string;
  language: string;
  /** Encrypted settings token; null is treated as absent. */
  settings?: string | null;
}

export interface SubmitResponse {
  flag: string;
}

export interface ErrorResponse {
  error: string;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  broker: 'connected' | 'disconnected';
  crypto: 'configured' | 'missing';
  pending: number;
}

// Execution engine (Piston v2) wire types

export interface EngineRuntime {
  language: string;
  version: string;
  aliases: string[];
}

export interface EngineFile {
  name?: string;
  content: string;
}

export interface EngineExecuteRequest {
  language: string;
  version: string;
  files: EngineFile[];
  compile_timeout: number;
  run_timeout: number;
  compile_memory_limit?: number; // bytes
  run_memory_limit?: number; // bytes
}

export interface EngineStage {
  stdout?: string | null;
  stderr?: string | null;
  output?: string | null;
  code?: number | null;
  signal?: string | null;
}

export interface EngineExecuteResponse {
  language?: string;
  version?: string;
  compile?: EngineStage | null;
  run?: EngineStage | null;
}
