import { WorkflowError, validationError } from '../src/domain/errors';
import { LogLevel, createLogger, errorContext, parseLogLevel, setLogLevel } from '../src/logger';
import { captureLogs, resetLogHandler } from './helpers/fakes';

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.Info);
    resetLogHandler();
  });

  it('merges base, child and call context', () => {
    const logs = captureLogs();
    const log = createLogger({ component: 'orchestrator' }).child({ runId: 'run_1' });

    log.info('Run advanced', { state: 'collecting' });

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: LogLevel.Info,
      message: 'Run advanced',
      context: { component: 'orchestrator', runId: 'run_1', state: 'collecting' },
    });
  });

  it('suppresses messages below the minimum level', () => {
    const logs = captureLogs();
    const log = createLogger();

    log.debug('hidden');
    setLogLevel(LogLevel.Warn);
    log.info('also hidden');
    log.warn('shown');
    log.error('shown too');

    expect(logs.map((entry) => entry.message)).toEqual(['shown', 'shown too']);
  });

  it('parses level names case-insensitively', () => {
    expect(parseLogLevel(' DEBUG ')).toBe(LogLevel.Debug);
    expect(parseLogLevel('warn')).toBe(LogLevel.Warn);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it('describes thrown values', () => {
    expect(errorContext(new WorkflowError(validationError('bad input')))).toEqual({
      error: 'bad input',
      code: 'VALIDATION.SCHEMA',
    });
    expect(errorContext(new TypeError('nope'))).toEqual({ error: 'nope', errorName: 'TypeError' });
    expect(errorContext(42)).toEqual({ error: '42' });
  });
});
