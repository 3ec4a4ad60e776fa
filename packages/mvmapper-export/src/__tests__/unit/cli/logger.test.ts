/**
 * Logger Formatting Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { CLILogger } from '../../../cli/lib/logger.js';
import { ConsoleLogger, isLogLevel } from '../../../core/utils/logger.js';

describe('CLILogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats JSON entries with service and metadata', () => {
    const logger = new CLILogger({ level: 'info', json: true });

    const line = logger.format('warn', '1 individuals are not documented in the metadata', {
      missing: 1,
    });
    const entry: unknown = JSON.parse(line);

    expect(entry).toMatchObject({
      level: 'warn',
      message: '1 individuals are not documented in the metadata',
      service: 'mvmapper-export',
      missing: 1,
    });
  });

  it('suppresses messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new CLILogger({ level: 'warn', json: false });

    logger.info('hidden');

    expect(info).not.toHaveBeenCalled();
  });

  it('prints a preview as a JSON array in JSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new CLILogger({ level: 'info', json: true });

    logger.table({ columns: ['key', 'PC1'], rows: [{ key: 'A', PC1: null }] });

    expect(log).toHaveBeenCalledWith('[{"key":"A","PC1":null}]');
  });

  it('prints aligned columns for humans', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new CLILogger({ level: 'info', json: false });

    logger.table({ columns: ['key', 'PC1'], rows: [{ key: 'AB', PC1: null }] });

    expect(log.mock.calls.map((call) => call[0])).toEqual(['key | PC1', '----+----', 'AB  | NA ']);
  });
});

describe('isLogLevel', () => {
  it('accepts only the four levels', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('constructor')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('ConsoleLogger', () => {
  it('formats pretty lines with inline metadata', () => {
    const logger = new ConsoleLogger({ level: 'debug', service: 'test', pretty: true });

    expect(logger.formatMessage('warn', 'careful', { missing: 1 })).toMatch(
      /^\[[^\]]+\] WARN: careful \{"missing":1\}$/
    );
  });

  it('formats JSON lines for production', () => {
    const logger = new ConsoleLogger({ level: 'debug', service: 'test', pretty: false });

    const entry: unknown = JSON.parse(logger.formatMessage('info', 'done'));

    expect(entry).toMatchObject({ level: 'info', service: 'test', message: 'done' });
  });
});
