import type { ZodError } from "zod";
import type { AppBoundaryError, AppBoundarySource } from "../../core/entities/appError";
import type { HttpClientError } from "./httpClient";

const mapHttpCode = (failure: HttpClientError): AppBoundaryError["code"] => {
  if (failure.httpStatus === 429) {
    return "rate_limited";
  }

  if (failure.httpStatus === 401 || failure.httpStatus === 403) {
    return "auth_invalid";
  }

  if (failure.code === "timeout") {
    return "timeout";
  }

  if (failure.code === "invalid_json") {
    return "invalid_json";
  }

  if (failure.code === "transport_error") {
    return "transport_error";
  }

  return "provider_error";
};

/**
 * Translates HTTP client failures into boundary errors tagged with the calling adapter.
 */
export const fromHttpFailure = (
  source: AppBoundarySource,
  provider: string,
  failure: HttpClientError,
  context?: string,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(failure),
  provider,
  message: context ? `${context}: ${failure.message}` : failure.message,
  retryable: failure.retryable,
  httpStatus: failure.httpStatus,
  cause: failure.cause,
});

export const malformedResponse = (
  source: AppBoundarySource,
  provider: string,
  message: string,
  cause?: ZodError,
): AppBoundaryError => ({
  source,
  code: "malformed_response",
  provider,
  message,
  retryable: false,
  cause: cause?.issues,
});
