import { createLogger } from '@trawl/extractor';
import { FetchMonitor } from './monitor';

describe('FetchMonitor', () => {
  const logger = createLogger('[Monitor]');
  let warnSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    infoSpy = jest.spyOn(logger, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should report a healthy empty window', () => {
    expect(new FetchMonitor(logger).health()).toEqual({
      samples: 0,
      successRate: 1,
      averageElapsedMs: 0,
      maxElapsedMs: 0,
      degraded: false,
    });
  });

  it('should aggregate recorded attempts', () => {
    const monitor = new FetchMonitor(logger);
    monitor.record(100, true);
    monitor.record(300, false);

    expect(monitor.health()).toEqual({
      samples: 2,
      successRate: 0.5,
      averageElapsedMs: 200,
      maxElapsedMs: 300,
      degraded: false,
    });
  });

  it('should not judge fewer than ten samples', () => {
    const monitor = new FetchMonitor(logger);
    for (let i = 0; i < 9; i++) {
      monitor.record(100, false);
    }

    expect(monitor.health().degraded).toBe(false);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should warn once when the success rate drops and log the recovery', () => {
    const monitor = new FetchMonitor(logger);
    for (let i = 0; i < 7; i++) monitor.record(100, true);
    for (let i = 0; i < 3; i++) monitor.record(100, false);

    expect(monitor.health().degraded).toBe(true);
    monitor.record(100, false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('Fetch health degraded', { successRate: 0.7, averageElapsedMs: 100 });

    for (let i = 0; i < 20; i++) monitor.record(100, true);
    expect(monitor.health().degraded).toBe(false);
    expect(infoSpy).toHaveBeenCalledTimes(1);
  });

  it('should flag slow responses', () => {
    const monitor = new FetchMonitor(logger);
    for (let i = 0; i < 10; i++) monitor.record(6_000, true);

    expect(monitor.health()).toMatchObject({ successRate: 1, averageElapsedMs: 6_000, degraded: true });
  });

  it('should keep only the latest hundred samples', () => {
    const monitor = new FetchMonitor(logger);
    for (let i = 0; i < 150; i++) monitor.record(i, true);

    expect(monitor.health()).toMatchObject({ samples: 100, maxElapsedMs: 149, averageElapsedMs: 99.5 });
  });
});
