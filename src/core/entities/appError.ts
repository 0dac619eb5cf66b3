import type { ResourceKind } from "./resource";

/**
 * Malformed caller input, failed fetch for one ticker, or a payload that cannot be normalized.
 */
export type AppErrorKind = "validation" | "retrieval" | "data_quality";

export type AppErrorCode =
  | "invalid_tickers"
  | "invalid_option"
  | "config_invalid"
  | "timeout"
  | "transport_error"
  | "auth_invalid"
  | "rate_limited"
  | "provider_error"
  | "invalid_json"
  | "malformed_response"
  | "missing_field"
  | "invalid_value";

export type AppError = {
  kind: AppErrorKind;
  code: AppErrorCode;
  message: string;
  retryable: boolean;
  symbol?: string;
  resource?: ResourceKind;
  httpStatus?: number;
  cause?: unknown;
};

export const validationError = (
  code: Extract<AppErrorCode, "invalid_tickers" | "invalid_option" | "config_invalid">,
  message: string,
  cause?: unknown,
): AppError => ({
  kind: "validation",
  code,
  message,
  retryable: false,
  cause,
});
