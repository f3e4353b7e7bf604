export type AppBoundarySource = "filings" | "reference" | "roster" | "output";

/**
 * Failure categories shared by every adapter, whatever vendor sits behind it.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "write_failed";

/**
 * A filing, CRM, roster or output failure normalized at the adapter edge. `provider` names the concrete adapter.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};
