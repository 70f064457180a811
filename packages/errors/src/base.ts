import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { RelayErrorOptions } from "./types.js";

/**
 * JSON shape produced by {@link RelayError.toJSON}
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  metadata?: Record<string, string>;
  traceId?: string;
  timestamp: string;
  stack?: string;
  cause?: string;
}

/**
 * Root of the relaykit error hierarchy.
 *
 * Every concrete error carries a catalog `code`; status, domain and
 * expectedness are looked up from {@link ERROR_CATALOG} at construction.
 */
export abstract class RelayError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  protected constructor(options: RelayErrorOptions<C>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.name = new.target.name;
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.traceId = options.traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
      ...(this.stack ? { stack: this.stack } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is any relaykit error */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/** Check if a value is an Error instance */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
