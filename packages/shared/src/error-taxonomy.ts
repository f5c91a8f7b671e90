/**
 * Error Taxonomy - Human-readable error messages and recommendations
 *
 * Maps internal error codes to messages, a failure class and a retry hint.
 */

import type { ErrorCode, FailureClass } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  failureClass: FailureClass;
  retryable: boolean;
}

/**
 * Error taxonomy mapping
 */
export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Fetch errors
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    description: 'The source took too long to respond.',
    recommendation: 'Increase the request timeout or lower concurrency.',
    severity: 'warning',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_DNS: {
    title: 'DNS Error',
    description: 'Could not resolve the source domain.',
    recommendation: 'Check the URL and the proxy resolver.',
    severity: 'error',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    description: 'Could not connect to the source or proxy.',
    recommendation: 'The source may be down or the proxy may be dead.',
    severity: 'warning',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_TLS: {
    title: 'SSL/TLS Error',
    description: 'Secure connection could not be established.',
    recommendation: 'The source or proxy may present an invalid certificate.',
    severity: 'error',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    description: 'The source rejected the request (4xx status).',
    recommendation: 'Check the URL, method and whether authentication is required.',
    severity: 'error',
    failureClass: 'permanent',
    retryable: false,
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    description: 'The source is experiencing issues (5xx status).',
    recommendation: 'The source may be overloaded. Retry later.',
    severity: 'warning',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_UNEXPECTED_STATUS: {
    title: 'Unexpected Status',
    description: 'The source answered with a status the pipeline does not follow.',
    recommendation: 'Check for redirects to login or consent pages.',
    severity: 'error',
    failureClass: 'permanent',
    retryable: false,
  },
  FETCH_EMPTY_BODY: {
    title: 'Empty Response',
    description: 'The source answered successfully but sent no content.',
    recommendation: 'Usually transient. Persisting empty bodies suggest silent throttling.',
    severity: 'warning',
    failureClass: 'transient_unavailable',
    retryable: true,
  },
  FETCH_IMPLAUSIBLE_BODY: {
    title: 'Implausible Response',
    description: 'The response body does not have the expected structure.',
    recommendation: 'Check the expected content shape of the target.',
    severity: 'warning',
    failureClass: 'transient_unavailable',
    retryable: true,
  },

  // Block detection
  BLOCK_CAPTCHA_SUSPECTED: {
    title: 'CAPTCHA Detected',
    description: 'The source may require human verification.',
    recommendation: 'Slow down, rotate proxies or switch to headless transport.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },
  BLOCK_CLOUDFLARE_SUSPECTED: {
    title: 'Cloudflare Protection',
    description: 'The source is protected by Cloudflare.',
    recommendation: 'Use headless transport or reduce request frequency.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },
  BLOCK_FORBIDDEN_403: {
    title: 'Access Forbidden',
    description: 'The source refused access to this identity (403).',
    recommendation: 'Rotate to a different proxy identity.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },
  BLOCK_RATE_LIMIT_429: {
    title: 'Rate Limited',
    description: 'Too many requests were sent to the source (429).',
    recommendation: 'Increase the minimum delay between requests.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },
  BLOCK_BOT_DETECTION: {
    title: 'Bot Detection',
    description: 'The source flagged the request as automated.',
    recommendation: 'Rotate proxies and user agents, or switch to headless transport.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },
  BLOCK_GEO: {
    title: 'Geographic Block',
    description: 'Content is not available in the proxy region.',
    recommendation: 'Use a proxy from an allowed region.',
    severity: 'warning',
    failureClass: 'transient_blocked',
    retryable: true,
  },

  // Proxy / retry
  PROXY_POOL_EXHAUSTED: {
    title: 'Proxy Pool Exhausted',
    description: 'Every proxy identity is cooling down.',
    recommendation: 'Add proxies or lower the cooldown cap.',
    severity: 'error',
    failureClass: 'permanent',
    retryable: false,
  },
  RETRY_EXHAUSTED: {
    title: 'Retries Exhausted',
    description: 'The page failed on every allowed attempt.',
    recommendation: 'Raise maxAttempts or investigate the dominant failure.',
    severity: 'error',
    failureClass: 'permanent',
    retryable: false,
  },

  // Extraction
  EXTRACT_NO_RECORDS: {
    title: 'No Records Found',
    description: 'The page was fetched but no records were recognized.',
    recommendation: 'The page structure may have changed. Review the selectors.',
    severity: 'warning',
    failureClass: 'extraction_drift',
    retryable: false,
  },
  EXTRACT_PARSE_ERROR: {
    title: 'Parse Error',
    description: 'The page content could not be parsed.',
    recommendation: 'Check the content shape and embedded data location.',
    severity: 'warning',
    failureClass: 'extraction_drift',
    retryable: false,
  },
  EXTRACT_FAILED: {
    title: 'Extractor Failed',
    description: 'The site extractor raised an error while parsing the page.',
    recommendation: 'Fix the site extractor; the page was treated as empty.',
    severity: 'error',
    failureClass: 'extraction_drift',
    retryable: false,
  },

  // Record validation
  RECORD_MISSING_REQUIRED: {
    title: 'Missing Required Field',
    description: 'A required field was not extracted.',
    recommendation: 'Add fallback strategies for the field.',
    severity: 'info',
    failureClass: 'extraction_drift',
    retryable: false,
  },
  RECORD_INVALID_NUMBER: {
    title: 'Invalid Number',
    description: 'A required numeric field could not be coerced.',
    recommendation: 'Adjust the number normalization locale or strip tokens.',
    severity: 'info',
    failureClass: 'extraction_drift',
    retryable: false,
  },
  RECORD_MISSING_IDENTITY: {
    title: 'Missing Identity',
    description: 'Neither an identifier nor fallback content fields were present.',
    recommendation: 'Extract an identifier or a title for every record.',
    severity: 'info',
    failureClass: 'extraction_drift',
    retryable: false,
  },
  RECORD_PLACEHOLDER: {
    title: 'Placeholder Item',
    description: 'The item matched a reject rule (ads, headers, placeholders).',
    recommendation: 'No action needed.',
    severity: 'info',
    failureClass: 'extraction_drift',
    retryable: false,
  },

  // Run lifecycle
  RUN_CANCELLED: {
    title: 'Run Cancelled',
    description: 'The caller stopped the run.',
    recommendation: 'No action needed.',
    severity: 'info',
    failureClass: 'cancelled',
    retryable: false,
  },

  UNKNOWN: {
    title: 'Unknown Error',
    description: 'An unexpected error occurred.',
    recommendation: 'Check the logs for details.',
    severity: 'error',
    failureClass: 'permanent',
    retryable: false,
  },
};

export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, value);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Check the logs for details.',
    severity: 'warning',
    failureClass: 'permanent',
    retryable: false,
  };
}

/**
 * Get user-friendly error message
 */
export function getErrorMessage(errorCode: string | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}

export function getFailureClass(errorCode: ErrorCode): FailureClass {
  return ERROR_TAXONOMY[errorCode].failureClass;
}
