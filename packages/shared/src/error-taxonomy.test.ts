import { ERROR_TAXONOMY, getErrorInfo, getErrorMessage, getFailureClass, isErrorCode } from './error-taxonomy';

describe('error taxonomy', () => {
  it('classifies blocking codes as transient_blocked', () => {
    expect(getFailureClass('BLOCK_RATE_LIMIT_429')).toBe('transient_blocked');
    expect(getFailureClass('BLOCK_FORBIDDEN_403')).toBe('transient_blocked');
    expect(getFailureClass('BLOCK_CAPTCHA_SUSPECTED')).toBe('transient_blocked');
  });

  it('classifies server and network errors as transient_unavailable', () => {
    expect(getFailureClass('FETCH_HTTP_5XX')).toBe('transient_unavailable');
    expect(getFailureClass('FETCH_TIMEOUT')).toBe('transient_unavailable');
    expect(getFailureClass('FETCH_EMPTY_BODY')).toBe('transient_unavailable');
  });

  it('classifies client errors and exhaustion as permanent', () => {
    expect(getFailureClass('FETCH_HTTP_4XX')).toBe('permanent');
    expect(getFailureClass('RETRY_EXHAUSTED')).toBe('permanent');
    expect(getFailureClass('PROXY_POOL_EXHAUSTED')).toBe('permanent');
  });

  it('marks only transient classes as retryable', () => {
    for (const info of Object.values(ERROR_TAXONOMY)) {
      const transient =
        info.failureClass === 'transient_blocked' || info.failureClass === 'transient_unavailable';
      expect(info.retryable).toBe(transient);
    }
  });

  it('returns null info for a null code', () => {
    expect(getErrorInfo(null)).toBeNull();
    expect(getErrorMessage(null)).toBe('');
  });

  it('falls back to a generic entry for unknown codes', () => {
    const info = getErrorInfo('SOMETHING_NEW');

    expect(info?.title).toBe('Unknown Error');
    expect(info?.description).toBe('Error: SOMETHING_NEW');
    expect(isErrorCode('SOMETHING_NEW')).toBe(false);
  });

  it('formats a message from title and description', () => {
    expect(getErrorMessage('BLOCK_RATE_LIMIT_429')).toBe(
      'Rate Limited: Too many requests were sent to the source (429).'
    );
  });
});
