import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ConsolaReporter, LogObject } from 'consola';
import { createLogger } from '../../src/lib/logger.js';
import { getSymbols } from '../../src/lib/environment.js';
import { CliError } from '../../src/lib/errors.js';

describe('createLogger', () => {
  let out: string[];
  let err: string[];

  beforeEach(() => {
    out = [];
    err = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      out.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      err.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with level symbols and sends errors to stderr', () => {
    const symbols = getSymbols();
    const logger = createLogger({ colors: false });

    logger.success('done');
    logger.info('note');
    logger.warn('careful');
    logger.error('failed');

    expect(out).toEqual([`${symbols.tick} done`, `${symbols.info} note`, `${symbols.warning} careful`]);
    expect(err).toEqual([`${symbols.cross} failed`]);
  });

  it('filters by level', () => {
    const logger = createLogger({ colors: false, level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.log('always');

    expect(out).toEqual([`${getSymbols().warning} shown`, 'always']);
  });

  it('changes level at runtime', () => {
    const logger = createLogger({ colors: false });

    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');

    expect(out).toEqual([`${getSymbols().bullet} shown`]);
    expect(logger.consola.level).toBe(4);
  });

  it('writes JSON entries in JSON mode', () => {
    const logger = createLogger({ json: true });

    logger.info('hello');
    logger.newline();
    logger.dim('skipped');

    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0] ?? '')).toMatchObject({ level: 'INFO', message: 'hello' });
  });

  it('prints suggestions under CLI errors', () => {
    const logger = createLogger({ colors: false });

    logger.logError(new CliError('Core is down', 'CORE_UNREACHABLE', {
      suggestions: ['Start the Core'],
      cause: new Error('ECONNREFUSED'),
    }), { verbose: true });

    const symbols = getSymbols();
    expect(err).toEqual([
      `${symbols.cross} Core is down`,
      `  ${symbols.arrow} Start the Core`,
      '  Caused by: ECONNREFUSED',
    ]);
  });

  it('writes error entries as JSON in JSON mode', () => {
    const logger = createLogger({ json: true });

    logger.logError(new CliError('Core is down', 'CORE_UNREACHABLE', { suggestions: ['Start the Core'] }));

    expect(JSON.parse(err[0] ?? '')).toMatchObject({
      level: 'ERROR',
      error: { code: 'CORE_UNREACHABLE', message: 'Core is down', suggestions: ['Start the Core'] },
    });
  });

  describe('forward', () => {
    it('routes core entries through consola tagged by component', () => {
      const seen: LogObject[] = [];
      const reporter: ConsolaReporter = {
        log: (logObj) => {
          seen.push(logObj);
        },
      };
      const logger = createLogger({ colors: false, level: 'debug', reporters: [reporter] });

      logger.forward({
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warn',
        component: 'groundcheck.transport',
        message: 'Retrying lookup',
        context: { attempt: 1 },
      });
      logger.forward({
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'error',
        component: 'groundcheck.dispatcher',
        message: 'Command failed unexpectedly',
        error: { name: 'Error', message: 'boom' },
      });

      expect(seen.map(({ type, tag, args }) => ({ type, tag, args }))).toEqual([
        { type: 'warn', tag: 'groundcheck.transport', args: ['Retrying lookup', { attempt: 1 }] },
        { type: 'error', tag: 'groundcheck.dispatcher', args: ['Command failed unexpectedly: boom'] },
      ]);
    });

    it('drops entries below the logger level', () => {
      const seen: LogObject[] = [];
      const logger = createLogger({ colors: false, level: 'info', reporters: [{ log: (logObj) => { seen.push(logObj); } }] });

      logger.forward({
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'debug',
        component: 'groundcheck.transport',
        message: 'POST /query',
      });

      expect(seen).toEqual([]);
    });
  });
});
