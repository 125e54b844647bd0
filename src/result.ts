/**
 * Result - Immutable outcome of an engine operation
 */

import type { CommerceError, ErrorCode } from './errors.js';

/**
 * Business outcome status
 */
export type Status = 'success' | 'failed';

/**
 * Handler types for fluent result handling
 */
export type HandlerType = Status | 'executed';

/**
 * Result metadata
 */
export interface ResultMetadata {
  [key: string]: unknown;
  runtime?: number;
  correlationId?: string;
  actor?: string;
}

export type Result<T, E extends CommerceError = CommerceError> =
  | SuccessResult<T, E>
  | FailedResult<T, E>;

/**
 * Result handler function
 */
export type ResultHandler<T, E extends CommerceError = CommerceError> = (
  result: Result<T, E>
) => void | Promise<void>;

/**
 * JSON representation of a result, as written by the log formatters
 */
export interface ResultJSON {
  operation: string;
  status: Status;
  reason?: string;
  code?: ErrorCode;
  error?: Record<string, unknown>;
  metadata: ResultMetadata;
}

abstract class BaseResult<T, E extends CommerceError> {
  /** Name of the operation that produced this result */
  readonly operation: string;

  /** Additional metadata (runtime, correlation id, ...) */
  readonly metadata: ResultMetadata;

  abstract readonly status: Status;
  abstract readonly success: boolean;
  abstract readonly failed: boolean;

  constructor(operation: string, metadata: ResultMetadata | undefined) {
    this.operation = operation;
    this.metadata = Object.freeze({ ...metadata });
  }

  /** Return the value, or throw the error of a failed result */
  abstract unwrap(): T;

  /** Copy of this result with extra metadata merged in */
  abstract withMetadata(extra: ResultMetadata): Result<T, E>;

  /** Transform the value of a success; failures pass through */
  abstract map<U>(fn: (value: T) => U, operation?: string): Result<U, E>;

  abstract toJSON(): ResultJSON;

  protected abstract self(): Result<T, E>;

  /** Handle result based on type */
  on(type: HandlerType, handler: ResultHandler<T, E>): this {
    if (this.shouldHandle(type)) {
      void handler(this.self());
    }
    return this;
  }

  /** Async handler that awaits */
  async onAsync(type: HandlerType, handler: ResultHandler<T, E>): Promise<this> {
    if (this.shouldHandle(type)) {
      await handler(this.self());
    }
    return this;
  }

  private shouldHandle(type: HandlerType): boolean {
    switch (type) {
      case 'success':
        return this.success;
      case 'failed':
        return this.failed;
      case 'executed':
        return true;
    }
  }

  get [Symbol.toStringTag](): string {
    return 'Result';
  }
}

export class SuccessResult<T, E extends CommerceError = CommerceError> extends BaseResult<T, E> {
  override readonly status = 'success' as const;
  override readonly success = true as const;
  override readonly failed = false as const;
  readonly value: T;

  constructor(operation: string, value: T, metadata?: ResultMetadata) {
    super(operation, metadata);
    this.value = value;
    Object.freeze(this);
  }

  override unwrap(): T {
    return this.value;
  }

  override withMetadata(extra: ResultMetadata): SuccessResult<T, E> {
    return new SuccessResult<T, E>(this.operation, this.value, { ...this.metadata, ...extra });
  }

  override map<U>(fn: (value: T) => U, operation: string = this.operation): Result<U, E> {
    return new SuccessResult<U, E>(operation, fn(this.value), this.metadata);
  }

  override toJSON(): ResultJSON {
    return { operation: this.operation, status: this.status, metadata: this.metadata };
  }

  protected override self(): Result<T, E> {
    return this;
  }
}

export class FailedResult<T, E extends CommerceError = CommerceError> extends BaseResult<T, E> {
  override readonly status = 'failed' as const;
  override readonly success = false as const;
  override readonly failed = true as const;
  readonly error: E;

  constructor(operation: string, error: E, metadata?: ResultMetadata) {
    super(operation, metadata);
    this.error = error;
    Object.freeze(this);
  }

  /** Reason for the failure */
  get reason(): string {
    return this.error.message;
  }

  get code(): ErrorCode {
    return this.error.code;
  }

  override unwrap(): T {
    throw this.error;
  }

  override withMetadata(extra: ResultMetadata): FailedResult<T, E> {
    return new FailedResult<T, E>(this.operation, this.error, { ...this.metadata, ...extra });
  }

  override map<U>(_fn: (value: T) => U, operation: string = this.operation): Result<U, E> {
    return new FailedResult<U, E>(operation, this.error, this.metadata);
  }

  override toJSON(): ResultJSON {
    return {
      operation: this.operation,
      status: this.status,
      reason: this.reason,
      code: this.code,
      error: this.error.toJSON(),
      metadata: this.metadata,
    };
  }

  protected override self(): Result<T, E> {
    return this;
  }
}

/**
 * Create a success result
 */
export function successResult<T, E extends CommerceError = CommerceError>(
  operation: string,
  value: T,
  metadata?: ResultMetadata
): Result<T, E> {
  return new SuccessResult<T, E>(operation, value, metadata);
}

/**
 * Create a failed result
 */
export function failedResult<T, E extends CommerceError = CommerceError>(
  operation: string,
  error: E,
  metadata?: ResultMetadata
): Result<T, E> {
  return new FailedResult<T, E>(operation, error, metadata);
}
