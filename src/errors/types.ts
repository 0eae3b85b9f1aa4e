import { ErrorCode } from './codes';

/**
 * Context information attached to errors for debugging and logging
 */
export interface ErrorContext {
  /** Request correlation ID for distributed tracing */
  correlationId?: string;
  /** Requested input format */
  inputFormat?: string;
  /** Requested output format */
  outputFormat?: string;
  /** Zero-based index of the failing stage */
  stage?: number;
  /** Engine that ran the failing stage */
  engine?: string;
  /** Engine process exit code */
  exitCode?: number | null;
  /** Stage timeout in milliseconds */
  timeoutMs?: number;
  /** Tail of the engine's diagnostic output, host paths removed */
  diagnostic?: string;
  /** File size in bytes */
  fileSize?: number;
  /** Allow additional context fields */
  [key: string]: unknown;
}

/**
 * Structured error response returned by the API
 */
export interface ApiErrorResponse {
  /** Error class name (e.g., "EngineTimeoutError") */
  error: string;
  /** Structured error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  statusCode: number;
  /** Request correlation ID */
  correlationId: string;
  /** ISO 8601 timestamp when error occurred */
  timestamp: string;
  /** Additional context for debugging */
  context?: ErrorContext;
}
