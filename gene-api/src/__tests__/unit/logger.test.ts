/**
 * Logger Tests
 */

import { createLogger, formatLine, forRequest, logger } from '../../utils/logger';

describe('createLogger', () => {
  it('turns every transport off for the silent level', () => {
    const silent = createLogger({ level: 'silent', nodeEnv: 'development' });

    expect(silent.silent).toBe(true);
    expect(silent.level).toBe('info');
  });

  it('logs at the configured level otherwise', () => {
    const debug = createLogger({ level: 'debug', nodeEnv: 'development' });

    expect(debug.silent).toBe(false);
    expect(debug.level).toBe('debug');
    expect(debug.transports).toHaveLength(1);
  });

  it('honours LOG_LEVEL=silent from the environment', () => {
    expect(logger.silent).toBe(true);
  });
});

describe('formatLine', () => {
  it('puts the request id after the level and drops the service name', () => {
    const line = formatLine({
      level: 'info',
      message: 'GET /genes',
      timestamp: '2024-01-02 03:04:05',
      service: 'gene-api',
      requestId: 'test-request-1',
      status: 200,
    });

    expect(line).toBe('2024-01-02 03:04:05 [info] (test-request-1): GET /genes {"status":200}');
  });

  it('appends the stack on its own line', () => {
    const line = formatLine({
      level: 'error',
      message: 'boom',
      timestamp: '2024-01-02 03:04:05',
      stack: 'Error: boom\n    at test',
    });

    expect(line).toBe('2024-01-02 03:04:05 [error]: boom\nError: boom\n    at test');
  });
});

describe('forRequest', () => {
  it('tags every entry with the request id', () => {
    const write = jest.spyOn(logger, 'write').mockImplementation(() => true);

    forRequest(['test-request-2', 'ignored']).info('hello');

    expect(write).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'info', message: 'hello', requestId: 'test-request-2' })
    );
    write.mockRestore();
  });

  it('falls back to the root logger without an id', () => {
    expect(forRequest(undefined)).toBe(logger);
  });
});
