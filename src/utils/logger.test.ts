import { describe, expect, it } from 'vitest';
import { PipelineErrorFactory } from '../errors';
import { formatLogLine, formatLogTimestamp, LogBuffer, LoggerFactory, LogLevel, type LogRecord } from './logger';

describe('log formatting', () => {
  it('formats timestamps in local time', () => {
    expect(formatLogTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });

  it('formats a record as a batch log line', () => {
    const line = formatLogLine({ level: LogLevel.WARN, message: 'careful', time: new Date(2024, 10, 20, 13, 14, 15) });
    expect(line).toBe('[2024-11-20 13:14:15] [WARN] careful');
  });
});

describe('Logger sinks', () => {
  it('forwards records at or above the level to attached sinks', () => {
    const logger = LoggerFactory.silent(LogLevel.INFO);
    const buffer = new LogBuffer();
    logger.addSink(buffer);

    logger.debug('hidden');
    logger.info('shown');
    logger.error('broken');

    const lines = buffer.getLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[INFO\] shown$/);
    expect(lines[1]).toMatch(/\[ERROR\] broken$/);
  });

  it('stops forwarding once detached', () => {
    const logger = LoggerFactory.silent();
    const buffer = new LogBuffer();
    const detach = logger.addSink(buffer);
    logger.info('one');
    detach();
    logger.info('two');
    expect(buffer.getLines()).toHaveLength(1);
  });

  it('logs state transitions as "subject: from -> to"', () => {
    const logger = LoggerFactory.silent();
    const buffer = new LogBuffer();
    logger.addSink(buffer);
    logger.logTransition('hero', 'Queued', 'Importing');
    expect(buffer.toString()).toMatch(/\[INFO\] hero: Queued -> Importing$/);
  });

  it('returns the value of a timed operation', async () => {
    const logger = LoggerFactory.silent();
    await expect(logger.withTiming('work', async () => 42)).resolves.toBe(42);
  });

  it('attaches pipeline error details to the logged record', () => {
    const logger = LoggerFactory.silent();
    const records: LogRecord[] = [];
    logger.addSink({ write: record => records.push(record) });

    logger.logError(PipelineErrorFactory.importError('unreadable', '/in/hero.vrm'), { asset: 'hero' });

    const errors = records.filter(record => record.level === LogLevel.ERROR);
    expect(errors.map(record => record.message)).toEqual(['Error occurred: unreadable']);
    expect(errors[0].context).toMatchObject({
      code: 'PIPELINE_IMPORT_ERROR',
      tag: 'PipelineImportError',
      context: { sourcePath: '/in/hero.vrm' },
      asset: 'hero',
    });
  });
});
