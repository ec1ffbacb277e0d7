/**
 * Error codes shared by the remote gateway and the post store
 *
 * Gateway calls never throw for HTTP or transport failures; they resolve to a
 * `GatewayResult` whose error carries one of these codes. The store layer
 * decides which codes are transient.
 */

import { z } from "zod";

// ============================================================================
// Gateway Error Codes
// ============================================================================

/** Access token rejected (401, expired or revoked token) */
export const AUTH_ERROR = "AUTH_ERROR";

/** Remote path does not exist */
export const NOT_FOUND = "NOT_FOUND";

/** Remote path already exists (folder creation) */
export const ALREADY_EXISTS = "ALREADY_EXISTS";

/** Remote quota exhausted: request rate (429) or storage space */
export const QUOTA_EXCEEDED = "QUOTA_EXCEEDED";

/** Transport failure or 5xx response */
export const NETWORK_ERROR = "NETWORK_ERROR";

/** Response body did not match the expected schema */
export const INVALID_RESPONSE = "INVALID_RESPONSE";

/** Anything the mapping does not recognize */
export const UNKNOWN = "UNKNOWN";

export const GatewayErrorCodeSchema = z.enum([
  AUTH_ERROR,
  NOT_FOUND,
  ALREADY_EXISTS,
  QUOTA_EXCEEDED,
  NETWORK_ERROR,
  INVALID_RESPONSE,
  UNKNOWN,
]);

export type GatewayErrorCode = z.infer<typeof GatewayErrorCodeSchema>;

// ============================================================================
// Store Error Codes
// ============================================================================

/** Slug violates the URL-safe slug pattern */
export const INVALID_SLUG = "INVALID_SLUG";

export type StoreErrorCode = GatewayErrorCode | typeof INVALID_SLUG;

// ============================================================================
// Result Types
// ============================================================================

export type GatewayError = {
  code: GatewayErrorCode;
  message: string;
  status?: number;
  details?: unknown;
};

export type GatewayResult<T> = { ok: true; data: T } | { ok: false; error: GatewayError };

export const createGatewayError = (
  code: GatewayErrorCode,
  message: string,
  status?: number,
  details?: unknown
): GatewayError => ({
  code,
  message,
  status,
  details,
});

/**
 * Only transport failures are worth another attempt; everything else is
 * a property of the request itself.
 */
export const isTransientError = (error: GatewayError): boolean => error.code === NETWORK_ERROR;
