import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { ChildLogger, Logger } from '../../../src/infrastructure/logging/Logger.js';
import { RecordingLogger } from '../../helpers/fakes.js';

const TIMESTAMP = '2024-03-01T12:00:00.000Z';

describe('Logger', () => {
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  describe('formatMessage', () => {
    const logger = new Logger('debug');

    it('should prefix timestamp and padded level', () => {
      expect(logger.formatMessage(TIMESTAMP, 'INFO', 'Ticket created')).toBe(`[${TIMESTAMP}] [INFO ] Ticket created`);
      expect(logger.formatMessage(TIMESTAMP, 'ERROR', 'Failed')).toBe(`[${TIMESTAMP}] [ERROR] Failed`);
    });

    it('should append object metadata as indented JSON', () => {
      expect(logger.formatMessage(TIMESTAMP, 'WARN', 'Slow', { ticketId: '1', ms: 20 })).toBe(
        `[${TIMESTAMP}] [WARN ] Slow\n{\n  "ticketId": "1",\n  "ms": 20\n}`
      );
    });

    it('should serialise errors by name and message', () => {
      expect(logger.formatMessage(TIMESTAMP, 'ERROR', 'Failed', { error: new TypeError('boom') })).toBe(
        `[${TIMESTAMP}] [ERROR] Failed\n{\n  "error": {\n    "name": "TypeError",\n    "message": "boom"\n  }\n}`
      );
    });

    it('should append scalar metadata inline', () => {
      expect(logger.formatMessage(TIMESTAMP, 'DEBUG', 'Count', 42)).toBe(`[${TIMESTAMP}] [DEBUG] Count 42`);
    });
  });

  it('should drop messages below the configured level', () => {
    const logger = new Logger('warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/\[WARN \] shown\n$/);
  });

  it('should append to the log file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'ticket-log-'));
    try {
      const path = join(dir, 'logs', 'bot.log');
      const logger = new Logger('info', path);
      logger.info('Ticket created');

      const content = readFileSync(path, 'utf-8');
      expect(content).toContain(`Logging initialized: ${path}`);
      expect(content).toMatch(/\[INFO \] Ticket created\n$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should prefix child logger messages', () => {
    const parent = new RecordingLogger();
    const child = new ChildLogger(parent, 'Tickets');

    child.warn('Effect failed', { effect: 'announce' });

    expect(parent.entries).toEqual([{ level: 'warn', message: '[Tickets] Effect failed', meta: { effect: 'announce' } }]);
  });
});
