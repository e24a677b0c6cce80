export interface StoreErrorOptions {
  id?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class StoreError extends Error {
  public readonly code: string;
  public readonly id?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: StoreErrorOptions & { code?: string },
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = options?.code || "STORE_ERROR";
    this.id = options?.id;
    this.details = options?.details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.id && { id: this.id }),
      ...(this.details && { details: this.details }),
      ...(this.cause !== undefined && { cause: serializeError(this.cause) }),
    };
  }
}

export class NotFoundError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, { ...options, code: "NOT_FOUND" });
  }
}

export class DeserializationError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, { ...options, code: "DESERIALIZATION" });
  }
}

export class IOFailureError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, { ...options, code: "IO_FAILURE" });
  }
}

export class InvalidEntityError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, { ...options, code: "INVALID_ENTITY" });
  }
}

export class ConfigError extends StoreError {
  constructor(message: string, options?: StoreErrorOptions) {
    super(message, { ...options, code: "CONFIG_ERROR" });
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
      ...("cause" in error && error.cause !== undefined && { cause: serializeError(error.cause) }),
    };
  }
  return error;
}
