/**
 * Dropbox error mapping
 */

import {
  ALREADY_EXISTS,
  AUTH_ERROR,
  createGatewayError,
  DropboxErrorBodySchema,
  type GatewayError,
  type GatewayErrorCode,
  NETWORK_ERROR,
  NOT_FOUND,
  QUOTA_EXCEEDED,
  UNKNOWN,
} from "@folio/protocol";

/**
 * Map an HTTP status (and, for endpoint errors, the error summary) to a
 * gateway error code.
 *
 * Dropbox reports endpoint-specific failures as 409 with a summary such as
 * "path/not_found/..", so the summary decides the code there.
 */
export const statusToErrorCode = (status: number, summary = ""): GatewayErrorCode => {
  switch (status) {
    case 401:
    case 403:
      return AUTH_ERROR;
    case 409:
      if (summary.includes("not_found")) return NOT_FOUND;
      if (summary.includes("insufficient_space")) return QUOTA_EXCEEDED;
      if (summary.includes("conflict")) return ALREADY_EXISTS;
      return UNKNOWN;
    case 429:
    case 507:
      return QUOTA_EXCEEDED;
    default:
      return status >= 500 ? NETWORK_ERROR : UNKNOWN;
  }
};

/**
 * Create a gateway error from a non-2xx response.
 *
 * JSON bodies contribute their `error_summary`; plain-text bodies (400
 * responses) become the message as-is.
 */
export const createErrorFromResponse = async (response: Response): Promise<GatewayError> => {
  let message = response.statusText;
  let summary = "";
  let details: unknown;

  let text = "";
  try {
    text = await response.text();
  } catch {
    // Body already consumed or unreadable, keep the status text
  }

  if (text) {
    message = text;
    try {
      const parsed = DropboxErrorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        details = parsed.data;
        if (parsed.data.error_summary) {
          summary = parsed.data.error_summary;
          message = parsed.data.error_summary;
        }
      }
    } catch {
      // Not JSON
    }
  }

  return createGatewayError(statusToErrorCode(response.status, summary), message, response.status, details);
};

/**
 * Create a network error from a rejected fetch.
 */
export const createNetworkError = (err: unknown): GatewayError =>
  createGatewayError(
    NETWORK_ERROR,
    err instanceof Error ? err.message : "Network request failed",
    undefined,
    err
  );
