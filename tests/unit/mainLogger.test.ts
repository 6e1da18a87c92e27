/**
 * Unit tests for mainLogger.ts
 */

import log from 'electron-log/node';
import { createLogger, initializeLogger, isLogLevel, setDebugLogging } from '../../src/mainLogger.js';

describe('mainLogger', () => {
  afterEach(() => {
    log.transports.console.level = false;
    log.transports.file.level = false;
  });

  test('initializeLogger sets the transport levels', () => {
    initializeLogger({ level: 'warn', fileLevel: 'error' });

    expect(log.transports.console.level).toBe('warn');
    expect(log.transports.file.level).toBe('error');
  });

  test('initializeLogger leaves the file level alone when not given', () => {
    initializeLogger({ level: 'info' });
    expect(log.transports.file.level).toBe(false);
  });

  test('setDebugLogging switches to debug and back to the configured level', () => {
    initializeLogger({ level: 'warn' });

    setDebugLogging(true);
    expect(log.transports.console.level).toBe('debug');

    setDebugLogging(false);
    expect(log.transports.console.level).toBe('warn');
  });

  test('disabling debug falls back to info when debug was the configured level', () => {
    initializeLogger({ level: 'debug' });
    setDebugLogging(false);
    expect(log.transports.console.level).toBe('info');
  });

  test('createLogger returns a scoped logger', () => {
    const logger = createLogger('Test');
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });

  test('isLogLevel recognizes known levels only', () => {
    expect(isLogLevel('verbose')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
