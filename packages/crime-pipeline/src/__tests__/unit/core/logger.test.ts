/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { Logger, createLogger } from '../../../core/utils/logger.js';
import { createTempDir, readLogLines, removeTempDir } from '../../utils/fixtures.js';

describe('Logger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('appends JSON entries to the log file', async () => {
    const logFile = join(dir, 'logs', 'pipeline.log');
    const logger = new Logger({ level: 'info', service: 'test', pretty: false, silent: true, logFile });

    logger.info('first', { rows: 3 });
    logger.error('second');

    const lines = await readLogLines(logFile);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 'info', service: 'test', message: 'first', rows: 3 });
    expect(lines[1]).toMatchObject({ level: 'error', service: 'test', message: 'second' });
  });

  it('drops entries below the configured level', async () => {
    const logFile = join(dir, 'pipeline.log');
    const logger = new Logger({ level: 'error', service: 'test', pretty: false, silent: true, logFile });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');
    logger.critical('critical');

    const lines = await readLogLines(logFile);
    expect(lines.map((line) => line.level)).toEqual(['error', 'critical']);
  });

  it('falls back to stderr when the log file cannot be written', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'info', service: 'test', pretty: true, silent: true, logFile: dir });

    logger.info('first');
    logger.info('second');

    expect(errorSpy).toHaveBeenCalledTimes(3);
    expect(errorSpy.mock.calls[0]?.[0]).toBe(
      `Log file ${dir} is not writable, logging to console only: EISDIR: illegal operation on a directory, open '${dir}'`
    );
    expect(errorSpy.mock.calls[1]?.[0]).toMatch(/^\[.+\] INFO: first$/);
    expect(errorSpy.mock.calls[2]?.[0]).toMatch(/^\[.+\] INFO: second$/);
  });

  it('writes critical entries to stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'info', service: 'test', pretty: true });

    logger.critical('Pipeline execution failed: boom');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toMatch(/^\[.+\] CRITICAL: Pipeline execution failed: boom$/);
  });

  it('formats metadata in pretty mode', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'info', service: 'test', pretty: true });

    logger.info('Data staging completed successfully', { rows: 4 });

    expect(infoSpy.mock.calls[0]?.[0]).toMatch(
      /^\[.+\] INFO: Data staging completed successfully \{"rows":4\}$/
    );
  });

  it('prefixes the service name of child loggers', async () => {
    const logFile = join(dir, 'pipeline.log');
    const parent = createLogger({ level: 'info', pretty: false, silent: true, logFile });

    parent.child('ingest').info('hello');

    const lines = await readLogLines(logFile);
    expect(lines[0]?.service).toBe('crime-pipeline:ingest');
  });

  it('names the service after the module', async () => {
    const logFile = join(dir, 'pipeline.log');
    const logger = createLogger({ module: 'cli', level: 'info', pretty: false, silent: true, logFile });

    logger.info('hello');

    const lines = await readLogLines(logFile);
    expect(lines[0]?.service).toBe('crime-pipeline:cli');
  });
});
