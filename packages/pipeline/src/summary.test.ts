import { RunSummaryRecorder } from './summary';
import { ManualClock } from './__tests__/fakes';

describe('RunSummaryRecorder', () => {
  it('should count attempts by outcome', () => {
    const recorder = new RunSummaryRecorder(new ManualClock());

    recorder.recordAttempt({ kind: 'soft_failure', status: 429, reason: 'throttled', errorCode: 'BLOCK_RATE_LIMIT_429', blocking: true, elapsedMs: 5 });
    recorder.recordAttempt({ kind: 'hard_failure', status: 404, reason: 'client_error', errorCode: 'FETCH_HTTP_4XX', elapsedMs: 5 });
    recorder.recordAttempt({
      kind: 'success',
      status: 200,
      body: '{}',
      headers: {},
      contentType: 'application/json',
      finalUrl: 'https://shop.test/',
      elapsedMs: 5,
    });

    expect(recorder.snapshot()).toMatchObject({ attempts: 3, successes: 1, softFailures: 1, hardFailures: 1 });
  });

  it('should only ever grow counters', () => {
    const recorder = new RunSummaryRecorder(new ManualClock());

    recorder.increment('records', 4);
    recorder.increment('records', -2);
    recorder.increment('records', 0);
    recorder.increment('records');

    expect(recorder.snapshot().records).toBe(5);
  });

  it('should stamp start and finish once', () => {
    const clock = new ManualClock(1_000);
    const recorder = new RunSummaryRecorder(clock);

    clock.advance(250);
    const first = recorder.finish();
    clock.advance(250);
    const second = recorder.finish();

    expect(first.startedAt).toBe(1_000);
    expect(first.finishedAt).toBe(1_250);
    expect(second.finishedAt).toBe(1_250);
  });

  it('should hand out frozen snapshots that do not follow later updates', () => {
    const recorder = new RunSummaryRecorder(new ManualClock());
    recorder.stop('shop', 'exhausted');

    const snapshot = recorder.snapshot();
    recorder.stop('news', 'cap_reached');
    recorder.increment('pages');

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.stopReasons).toEqual({ shop: 'exhausted' });
    expect(snapshot.pages).toBe(0);
  });

  it('should count failures by class', () => {
    const recorder = new RunSummaryRecorder(new ManualClock());

    recorder.recordAttempt({ kind: 'soft_failure', status: 429, reason: 'throttled', errorCode: 'BLOCK_RATE_LIMIT_429', blocking: true, elapsedMs: 5 });
    recorder.recordAttempt({ kind: 'soft_failure', status: 502, reason: 'unavailable', errorCode: 'FETCH_HTTP_5XX', blocking: false, elapsedMs: 5 });
    recorder.recordAttempt({ kind: 'hard_failure', status: 404, reason: 'client_error', errorCode: 'FETCH_HTTP_4XX', elapsedMs: 5 });
    recorder.recordFailure('EXTRACT_NO_RECORDS');
    recorder.stop('shop', 'cancelled');

    expect(recorder.snapshot().failures).toEqual({
      transient_blocked: 1,
      transient_unavailable: 1,
      permanent: 1,
      extraction_drift: 1,
      cancelled: 1,
    });
  });

  it('should keep the first stop reason of a target', () => {
    const recorder = new RunSummaryRecorder(new ManualClock());

    recorder.stop('shop', 'cancelled');
    recorder.stop('shop', 'exhausted');

    expect(recorder.snapshot().stopReasons).toEqual({ shop: 'cancelled' });
    expect(recorder.snapshot().failures.cancelled).toBe(1);
  });
});
