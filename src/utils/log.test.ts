import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { EventEmitter } from 'events';
import { LogLevel, debug, formatExtraInformation, formatLogLine, log, logToFile, parseLogLevel, warn } from './log';

// Mock dependencies
vi.mock('fs');

describe('Log Utilities', () => {
  const originalEnv = process.env;
  let mockWriteStream: EventEmitter & {
    write: ReturnType<typeof vi.fn>;
    end: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    delete process.env.LOG_FILE;
    delete process.env.LOG_ACCOUNT;
    delete process.env.LOG_LEVEL;

    mockWriteStream = Object.assign(new EventEmitter(), {
      write: vi.fn(),
      end: vi.fn(),
    });
    vi.mocked(fs.createWriteStream).mockReturnValue(mockWriteStream as unknown as fs.WriteStream);
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('should accept level names in any case', () => {
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    });

    it('should fall back to LOG', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.LOG);
      expect(parseLogLevel('verbose')).toBe(LogLevel.LOG);
    });
  });

  describe('logToFile', () => {
    it('should do nothing when LOG_FILE is unset', () => {
      logToFile('Test message');

      expect(fs.createWriteStream).not.toHaveBeenCalled();
    });

    it('should append to the log file', () => {
      process.env.LOG_FILE = '/tmp/budget.log';

      logToFile('Test message');

      expect(fs.createWriteStream).toHaveBeenCalledWith('/tmp/budget.log', { flags: 'a' });
      expect(mockWriteStream.write).toHaveBeenCalledWith('Test message\n');
      expect(mockWriteStream.end).toHaveBeenCalled();
    });

    it('should overwrite the log file when reset is true', () => {
      process.env.LOG_FILE = '/tmp/budget.log';

      logToFile('Reset message', true);

      expect(fs.createWriteStream).toHaveBeenCalledWith('/tmp/budget.log', { flags: 'w' });
    });

    it('should report a log file that cannot be opened instead of throwing', () => {
      process.env.LOG_FILE = '/tmp/missing/budget.log';
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logToFile('Test message');

      expect(() => mockWriteStream.emit('error', new Error('ENOENT'))).not.toThrow();
      expect(errorSpy).toHaveBeenCalledWith('Could not write to log file /tmp/missing/budget.log: ENOENT');
    });
  });

  describe('formatLogLine', () => {
    it('should join level, caller, message and extra information', () => {
      const line = formatLogLine(
        { fileName: 'session', functionName: 'observe', level: LogLevel.LOG, message: 'Observation finished' },
        { scopes: 2, at: new Date('2024-01-01T00:00:00Z') },
      );

      expect(line).toBe('LOG | session:observe | Observation finished | scopes: 2 | at: 2024-01-01T00:00:00.000Z');
    });

    it('should lead with the account when one is set', () => {
      const line = formatLogLine({
        fileName: 'limit-store',
        functionName: 'setLimit',
        account: 'acc-1',
        level: LogLevel.WARN,
        message: 'Budget limit set',
      });

      expect(line).toBe('acc-1 | WARN | limit-store:setLimit | Budget limit set');
    });
  });

  describe('formatExtraInformation', () => {
    it('should format errors by message and objects as JSON', () => {
      expect(formatExtraInformation({ error: new Error('disk full'), scope: { kind: 'overall' } })).toBe(
        'error: disk full | scope: {"kind":"overall"}',
      );
    });
  });

  describe('level filtering', () => {
    it('should drop messages below LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'WARN';
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      log('Budget limit set');
      warn('Budget exceeded', { limit: 10 });

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith(expect.stringMatching(/^WARN \| .+ \| Budget exceeded \| limit: 10$/));
    });

    it('should not print debug output at the default level', () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      debug('Window stored');

      expect(debugSpy).not.toHaveBeenCalled();
    });
  });
});
