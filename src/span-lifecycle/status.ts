/**
 * Canonical span status codes (OpenCensus / gRPC).
 */
export const StatusCode = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

const HTTP_STATUS: Record<number, StatusCode> = {
  400: StatusCode.INVALID_ARGUMENT,
  401: StatusCode.UNAUTHENTICATED,
  403: StatusCode.PERMISSION_DENIED,
  404: StatusCode.NOT_FOUND,
  429: StatusCode.RESOURCE_EXHAUSTED,
  499: StatusCode.CANCELLED,
  501: StatusCode.UNIMPLEMENTED,
  503: StatusCode.UNAVAILABLE,
  504: StatusCode.DEADLINE_EXCEEDED,
};

/**
 * Maps an HTTP response status to a canonical span status code.
 *
 * 2xx and 3xx are `OK`; a handful of well-known 4xx/5xx codes have their own mapping;
 * everything else, `500` included, is `UNKNOWN`.
 */
export function httpStatusToTraceStatus(status: number): StatusCode {
  if (status >= 200 && status < 400) {
    return StatusCode.OK;
  }

  return HTTP_STATUS[status] ?? StatusCode.UNKNOWN;
}
