import type { ContentfulStatusCode } from 'hono/utils/http-status';

/** HTTP status for a resolver error code. */
export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'INPUT_ERROR':
      return 400;
    case 'CONVERSION_ERROR':
      return 422;
    case 'POLL_TIMEOUT':
      return 504;
    case 'UPSTREAM_UNAVAILABLE':
    case 'SIGNATURE_ERROR':
    case 'PARSE_ERROR':
      return 502;
    default:
      return 500;
  }
}
