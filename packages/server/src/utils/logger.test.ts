import { Logger } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should prefix lines with the time and tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger();
    logger.setLevel('info');

    logger.info('[Test]', 'hello', 42, { a: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = log.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Test\]$/);
    expect(rest).toEqual(['hello', '42', '{"a":1}']);
  });

  it('should drop lines below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger();
    logger.setLevel('warn');

    logger.debug('[Test]', 'hidden');
    logger.warn('[Test]', 'shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should print error stacks', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger();
    const failure = new Error('boom');

    logger.error('[Test]', failure);

    expect(error.mock.calls[0][1]).toBe(failure.stack);
  });

  it('should take its level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'ERROR');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger();

    logger.warn('[Test]', 'hidden');

    expect(warn).not.toHaveBeenCalled();
  });
});
