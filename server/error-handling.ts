/**
 * Error Handling & Device/Operator Messaging
 *
 * Maps internal errors to user-facing messages and HTTP status codes.
 * Validation, not-found, inference and storage failures share one
 * AppError type; the code decides how each surfaces.
 */

import { ZodError } from 'zod';

export enum ErrorCode {
  // Inference provider
  INFERENCE_FAILED = 'INFERENCE_FAILED',
  INFERENCE_TIMEOUT = 'INFERENCE_TIMEOUT',
  INFERENCE_RATE_LIMIT = 'INFERENCE_RATE_LIMIT',
  INFERENCE_NOT_CONFIGURED = 'INFERENCE_NOT_CONFIGURED',
  PREDICTION_PARSE_FAILED = 'PREDICTION_PARSE_FAILED',
  QUEUE_FULL = 'QUEUE_FULL',

  // Dashboard
  DASHBOARD_UNAVAILABLE = 'DASHBOARD_UNAVAILABLE',

  // Database Errors
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',

  // Validation Errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_IMAGE = 'INVALID_IMAGE',

  // Not found
  DEVICE_NOT_FOUND = 'DEVICE_NOT_FOUND',
  CONTROL_NOT_FOUND = 'CONTROL_NOT_FOUND',
  RESULT_NOT_FOUND = 'RESULT_NOT_FOUND',

  // Auth Errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Generic
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

interface UserMessage {
  title: string;
  message: string;
  action?: string;
  retryAfterSeconds?: number;
}

const USER_MESSAGES: Record<ErrorCode, UserMessage> = {
  [ErrorCode.INFERENCE_FAILED]: {
    title: 'Inference failed',
    message: 'The image could not be analyzed by the inference service.',
    action: 'The next upload will be analyzed as usual.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.INFERENCE_TIMEOUT]: {
    title: 'Inference timed out',
    message: 'The inference service did not answer in time.',
    retryAfterSeconds: 60,
  },
  [ErrorCode.INFERENCE_RATE_LIMIT]: {
    title: 'Inference service is busy',
    message: 'The inference service is rate limiting requests.',
    retryAfterSeconds: 30,
  },
  [ErrorCode.INFERENCE_NOT_CONFIGURED]: {
    title: 'Inference not configured',
    message: 'No inference credentials are configured on the server.',
    action: 'Set ROBOFLOW_API_KEY and a workflow or model id.',
  },
  [ErrorCode.PREDICTION_PARSE_FAILED]: {
    title: 'Unreadable prediction',
    message: 'The inference service returned a response that could not be parsed.',
  },
  [ErrorCode.QUEUE_FULL]: {
    title: 'Inference queue full',
    message: 'Too many images are waiting for analysis; this one was skipped.',
    retryAfterSeconds: 30,
  },

  [ErrorCode.DASHBOARD_UNAVAILABLE]: {
    title: 'Dashboard unavailable',
    message: 'The telemetry dashboard could not be updated.',
    retryAfterSeconds: 60,
  },

  [ErrorCode.DATABASE_CONNECTION_FAILED]: {
    title: 'Server connection issue',
    message: 'We\'re having trouble connecting to our database.',
    action: 'Please retry the request.',
    retryAfterSeconds: 30,
  },
  [ErrorCode.DATABASE_QUERY_FAILED]: {
    title: 'Data access failed',
    message: 'We couldn\'t read or write the requested data.',
    action: 'Please try again.',
    retryAfterSeconds: 10,
  },

  [ErrorCode.INVALID_INPUT]: {
    title: 'Invalid input',
    message: 'The information you provided isn\'t valid.',
    action: 'Please check your input and try again.',
  },
  [ErrorCode.INVALID_IMAGE]: {
    title: 'Invalid image',
    message: 'The uploaded file is not a readable image.',
    action: 'Upload a JPEG or PNG frame.',
  },

  [ErrorCode.DEVICE_NOT_FOUND]: {
    title: 'Device not found',
    message: 'No device is registered with that code.',
  },
  [ErrorCode.CONTROL_NOT_FOUND]: {
    title: 'No control found',
    message: 'No control found for this device.',
    action: 'Set a control command before reporting its status.',
  },
  [ErrorCode.RESULT_NOT_FOUND]: {
    title: 'No inference result',
    message: 'No inference result exists for this device yet.',
  },

  [ErrorCode.UNAUTHORIZED]: {
    title: 'Invalid credentials',
    message: 'Invalid device credentials.',
  },
  [ErrorCode.FORBIDDEN]: {
    title: 'Access denied',
    message: 'Access denied.',
  },

  [ErrorCode.INTERNAL_ERROR]: {
    title: 'Something went wrong',
    message: 'We\'re experiencing a temporary issue.',
    action: 'Please try again in a moment.',
    retryAfterSeconds: 10,
  },
};

const ERROR_PROPERTIES: Record<ErrorCode, { statusCode: number; isRetryable: boolean }> = {
  [ErrorCode.INFERENCE_FAILED]: { statusCode: 502, isRetryable: true },
  [ErrorCode.INFERENCE_TIMEOUT]: { statusCode: 504, isRetryable: true },
  [ErrorCode.INFERENCE_RATE_LIMIT]: { statusCode: 429, isRetryable: true },
  [ErrorCode.INFERENCE_NOT_CONFIGURED]: { statusCode: 503, isRetryable: false },
  [ErrorCode.PREDICTION_PARSE_FAILED]: { statusCode: 502, isRetryable: false },
  [ErrorCode.QUEUE_FULL]: { statusCode: 503, isRetryable: false },
  [ErrorCode.DASHBOARD_UNAVAILABLE]: { statusCode: 503, isRetryable: false },
  [ErrorCode.DATABASE_CONNECTION_FAILED]: { statusCode: 503, isRetryable: true },
  [ErrorCode.DATABASE_QUERY_FAILED]: { statusCode: 500, isRetryable: true },
  [ErrorCode.INVALID_INPUT]: { statusCode: 400, isRetryable: false },
  [ErrorCode.INVALID_IMAGE]: { statusCode: 400, isRetryable: false },
  [ErrorCode.DEVICE_NOT_FOUND]: { statusCode: 404, isRetryable: false },
  [ErrorCode.CONTROL_NOT_FOUND]: { statusCode: 404, isRetryable: false },
  [ErrorCode.RESULT_NOT_FOUND]: { statusCode: 404, isRetryable: false },
  [ErrorCode.UNAUTHORIZED]: { statusCode: 401, isRetryable: false },
  [ErrorCode.FORBIDDEN]: { statusCode: 403, isRetryable: false },
  [ErrorCode.INTERNAL_ERROR]: { statusCode: 500, isRetryable: true },
};

/**
 * Application error with proper context
 */
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    public originalError?: Error,
    public context?: Record<string, unknown>
  ) {
    const message = USER_MESSAGES[code]?.message || 'Something went wrong';
    super(message);
    this.name = 'AppError';
  }

  getStatusCode(): number {
    return ERROR_PROPERTIES[this.code]?.statusCode || 500;
  }

  isRetryable(): boolean {
    return ERROR_PROPERTIES[this.code]?.isRetryable || false;
  }

  /** Original error text when there is one, the user message otherwise. */
  describe(): string {
    return this.originalError?.message || this.message;
  }

  toJSON() {
    const field = this.context?.field;
    return {
      code: this.code,
      title: USER_MESSAGES[this.code]?.title,
      message: USER_MESSAGES[this.code]?.message,
      action: USER_MESSAGES[this.code]?.action,
      retryAfterSeconds: USER_MESSAGES[this.code]?.retryAfterSeconds,
      statusCode: this.getStatusCode(),
      isRetryable: this.isRetryable(),
      ...(typeof field === 'string' && { field }),
      // Only expose original error details in development
      ...(process.env.NODE_ENV === 'development' && {
        originalError: this.originalError?.message,
        context: this.context,
      }),
    };
  }
}

// Error families surfaced by the services

export class ValidationError extends AppError {
  constructor(code: ErrorCode = ErrorCode.INVALID_INPUT, originalError?: Error, context?: Record<string, unknown>) {
    super(code, originalError, context);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(code: ErrorCode = ErrorCode.DEVICE_NOT_FOUND, context?: Record<string, unknown>) {
    super(code, undefined, context);
    this.name = 'NotFoundError';
  }
}

export class InferenceFailure extends AppError {
  constructor(code: ErrorCode = ErrorCode.INFERENCE_FAILED, originalError?: Error, context?: Record<string, unknown>) {
    super(code, originalError, context);
    this.name = 'InferenceFailure';
  }
}

export class StorageError extends AppError {
  constructor(
    originalError?: Error,
    context?: Record<string, unknown>,
    code: ErrorCode.DATABASE_QUERY_FAILED | ErrorCode.DATABASE_CONNECTION_FAILED = ErrorCode.DATABASE_QUERY_FAILED
  ) {
    super(code, originalError, context);
    this.name = 'StorageError';
  }
}

/**
 * Helper to convert any error to AppError
 */
export function toAppError(error: unknown, defaultCode = ErrorCode.INTERNAL_ERROR): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const field = issue?.path.join('.') || undefined;
    return new ValidationError(ErrorCode.INVALID_INPUT, error, { field, issue: issue?.message });
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('rate limit') || message.includes('429')) {
      return new InferenceFailure(ErrorCode.INFERENCE_RATE_LIMIT, error);
    }
    if (message.includes('timeout') || message.includes('timed out') || message.includes('504')) {
      return new InferenceFailure(ErrorCode.INFERENCE_TIMEOUT, error);
    }
    return new AppError(defaultCode, error);
  }

  return new AppError(defaultCode, new Error(String(error)));
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT']);

function isConnectionFailure(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) return true;
  return error.message.toLowerCase().includes('connection terminated');
}

/**
 * Run a storage call and surface any failure as a StorageError
 */
export async function withStorageErrors<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) throw error;
    const cause = error instanceof Error ? error : new Error(String(error));
    const code = isConnectionFailure(cause) ? ErrorCode.DATABASE_CONNECTION_FAILED : ErrorCode.DATABASE_QUERY_FAILED;
    throw new StorageError(cause, { operation }, code);
  }
}
