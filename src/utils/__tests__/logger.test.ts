import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  LogLevel,
  configureLogger,
  createLogger,
  createSilentLogger,
  formatLogEntry,
  parseLogLevel,
  setLogLevel,
  type LogEntry,
} from '../logger';

describe('Logger', () => {
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;
  let consoleWarnSpy: MockInstance<Parameters<typeof console.warn>, void>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel(LogLevel.INFO);
  });

  it('prefixes output with level and module', () => {
    createLogger('scan').info('Scanned', { columns: 3 });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const output = consoleLogSpy.mock.calls[0][0] as string;
    expect(output).toContain('[INFO] [scan] Scanned {"columns":3}');
  });

  it('drops entries below the global level, even for loggers created earlier', () => {
    const logger = createLogger('scan');
    setLogLevel('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when silent', () => {
    createSilentLogger('quiet').warn('nothing');
    expect(consoleWarnSpy).not.toHaveBeenCalled();
  });

  it('merges fixed context and names child modules', () => {
    const entries: LogEntry[] = [];
    configureLogger({ outputHandler: entry => entries.push(entry) });
    try {
      createLogger('engine').child('calibrate').withContext({ runId: 'run-1' }).info('done', { rows: 2 });
    } finally {
      configureLogger({ outputHandler: undefined });
    }

    expect(entries).toHaveLength(1);
    expect(entries[0].module).toBe('engine:calibrate');
    expect(entries[0].context).toEqual({ runId: 'run-1', rows: 2 });
  });

  it('formats entries without a timestamp on request', () => {
    const entry: LogEntry = { timestamp: 't', level: 'error', module: 'm', message: 'boom' };
    expect(formatLogEntry(entry, false)).toBe('[ERROR] [m] boom');
    expect(formatLogEntry(entry)).toBe('[t] [ERROR] [m] boom');
  });

  it('parses level names', () => {
    expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
    expect(parseLogLevel('none')).toBe(LogLevel.SILENT);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });
});
