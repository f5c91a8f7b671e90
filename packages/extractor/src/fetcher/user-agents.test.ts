import { buildBrowserHeaders, getRandomUserAgent, USER_AGENTS } from './user-agents';

describe('getRandomUserAgent', () => {
  it('maps the random draw onto the pool', () => {
    expect(getRandomUserAgent(() => 0)).toBe(USER_AGENTS[0]);
    expect(getRandomUserAgent(() => 0.99)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
  });

  it('stays inside the pool for a draw of exactly 1', () => {
    expect(getRandomUserAgent(() => 1)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
  });
});

describe('buildBrowserHeaders', () => {
  it('sets the given user agent with navigation headers', () => {
    const headers = buildBrowserHeaders('TestAgent/1.0');

    expect(headers['User-Agent']).toBe('TestAgent/1.0');
    expect(headers['Accept-Language']).toBe('en-US,en;q=0.9');
    expect(headers.DNT).toBe('1');
  });
});
