/**
 * Post store errors
 */

import type { GatewayError, StoreErrorCode } from "@folio/protocol";

/**
 * A remote failure with the store operation and path that hit it.
 *
 * Message format: "<operation> <path>: <reason>"
 */
export class PostStoreError extends Error {
  readonly code: StoreErrorCode;
  readonly operation: string;
  readonly path: string;
  readonly status?: number;

  constructor(
    code: StoreErrorCode,
    operation: string,
    path: string,
    reason: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`${operation} ${path}: ${reason}`, { cause: options?.cause });
    this.name = "PostStoreError";
    this.code = code;
    this.operation = operation;
    this.path = path;
    this.status = options?.status;
  }

  static fromGateway(operation: string, path: string, error: GatewayError): PostStoreError {
    return new PostStoreError(error.code, operation, path, error.message, {
      cause: error,
      status: error.status,
    });
  }
}
