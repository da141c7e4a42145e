import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger, LogLevel } from '../../src/logger';

describe('Logger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webtask-logger-'));
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('should drop messages below the minimum level', () => {
    const logger = new Logger('test-session', logDir, { minLevel: LogLevel.WARN, logToFile: false });

    logger.info('hidden');
    logger.warn('shown');

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should change level at runtime', () => {
    const logger = new Logger('test-session', logDir, { minLevel: LogLevel.ERROR, logToFile: false });
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('now visible');
    expect(console.debug).toHaveBeenCalledWith('[DEBUG] now visible');
  });

  it('should append to the session log file when enabled', () => {
    const logger = new Logger('test-session', logDir, { minLevel: LogLevel.INFO, logToFile: true });

    logger.info('first');
    logger.error('second', new Error('boom'));

    const lines = fs.readFileSync(path.join(logDir, 'test-session.log'), 'utf8');
    expect(lines).toMatch(/\[INFO\] first\n/);
    expect(lines).toMatch(/\[ERROR\] second\nError: boom/);
  });

  it('should not create a log file when file output is off', () => {
    const logger = new Logger('test-session', logDir, { minLevel: LogLevel.INFO, logToFile: false });
    logger.info('console only');
    expect(fs.existsSync(logger.getLogFile())).toBe(false);
  });

  it('should write a workload report with the run duration', () => {
    const logger = new Logger('test-session', logDir, { minLevel: LogLevel.ERROR, logToFile: false });

    const file = logger.generateReport({
      startTime: new Date('2026-01-01T10:00:00Z'),
      endTime: new Date('2026-01-01T10:02:05Z'),
      entryUrl: 'https://example.com/skills',
      attempted: 3,
      completed: 2,
      failed: 1,
      skipped: 0,
      questionsAnswered: 12,
      cancelled: false,
    });

    expect(file).toBe(path.join(logDir, 'reports', 'test-session_report.json'));
    const report = JSON.parse(fs.readFileSync(file, 'utf8'));
    expect(report).toEqual({
      sessionId: 'test-session',
      entryUrl: 'https://example.com/skills',
      startTime: '2026-01-01T10:00:00.000Z',
      endTime: '2026-01-01T10:02:05.000Z',
      duration: '2m 5s',
      attempted: 3,
      completed: 2,
      failed: 1,
      skipped: 0,
      questionsAnswered: 12,
      cancelled: false,
    });
  });
});
