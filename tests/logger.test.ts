import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  setLogOutput,
  resetLogOutput,
  parseLogLevel,
  LogLevel,
} from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';
import { createDataspace, negotiate } from './helpers.js';

describe('Structured Logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput(entry => captured.push(entry));
  });

  afterEach(() => {
    resetLogOutput();
  });

  it('writes module, level and message on every entry', () => {
    createLogger('NegotiationEngine').info('Negotiation transition');
    expect(captured).toHaveLength(1);
    expect(captured[0]).toMatchObject({ module: 'NegotiationEngine', level: 'INFO', message: 'Negotiation transition' });
    expect(new Date(captured[0].timestamp).toISOString()).toBe(captured[0].timestamp);
  });

  it('omits an empty context', () => {
    const log = createLogger('m');
    log.info('bare');
    log.info('empty', {});
    expect(captured.map(e => e.context)).toEqual([undefined, undefined]);
  });

  it('drops entries below the logger level, INFO by default', () => {
    const standard = createLogger('standard');
    const verbose = createLogger('verbose', LogLevel.DEBUG);
    const quiet = createLogger('quiet', LogLevel.WARN);
    standard.debug('dropped');
    standard.info('kept');
    verbose.debug('kept too');
    quiet.info('dropped');
    quiet.warn('kept as well');
    expect(captured.map(e => `${e.module}:${e.level}:${e.message}`)).toEqual([
      'standard:INFO:kept',
      'verbose:DEBUG:kept too',
      'quiet:WARN:kept as well',
    ]);
  });

  it('suppresses everything at SILENT', () => {
    const log = createLogger('m', LogLevel.SILENT);
    log.error('nothing');
    expect(captured).toEqual([]);
  });

  describe('child loggers', () => {
    it('add bindings beneath the call context', () => {
      const log = createLogger('TransferCoordinator').child({ participant: 'provider', processId: 'tp_1' });
      log.info('Transfer transition', { processId: 'tp_2', to: 'STARTED' });
      expect(captured[0].context).toEqual({ participant: 'provider', processId: 'tp_2', to: 'STARTED' });
    });

    it('keep the parent level and merge nested bindings', () => {
      const log = createLogger('m', LogLevel.ERROR).child({ a: 1 }).child({ b: 2 });
      log.warn('dropped');
      log.error('kept');
      expect(captured).toHaveLength(1);
      expect(captured[0].context).toEqual({ a: 1, b: 2 });
    });
  });

  describe('parseLogLevel', () => {
    it.each([
      ['debug', LogLevel.DEBUG],
      ['INFO', LogLevel.INFO],
      [' Warn ', LogLevel.WARN],
      ['error', LogLevel.ERROR],
      ['silent', LogLevel.SILENT],
    ])('maps %j', (name, level) => {
      expect(parseLogLevel(name)).toBe(level);
    });

    it('returns undefined for unknown names', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
    });
  });

  it('tags participant log lines with the participant name', async () => {
    const space = await createDataspace({ providerConfig: { logLevel: 'INFO' } });
    await negotiate(space);

    const transitions = captured.filter(e => e.module === 'NegotiationEngine' && e.message === 'Negotiation transition');
    expect(transitions.length).toBeGreaterThan(0);
    expect(transitions.every(e => e.context?.participant === 'provider')).toBe(true);
  });
});
