/**
 * HTTP status codes used across the service
 */
export const HTTP_STATUS = {
  OK: 200,
  PARTIAL_CONTENT: 206,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504
} as const;

/**
 * HTTP header values used in streaming responses
 */
export const HTTP_HEADERS = {
  DEFAULT_CONTENT_TYPE: 'application/octet-stream',
  ACCEPT_RANGES: 'bytes',
  CACHE_CONTROL_NO_CACHE: 'no-cache'
} as const;

/**
 * Custom headers a browser client may read (exposed through CORS)
 */
export const EXPOSED_HEADERS = ['Content-Length', 'Content-Range', 'X-Filename', 'X-Filesize', 'X-Content-Type'] as const;
