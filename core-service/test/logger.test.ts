import { describe, it, expect, afterEach } from 'vitest';
import {
  logger,
  configureLogger,
  createChildLogger,
  formatLogLine,
  setLogLevel,
  subscribeToLogs,
  withCorrelationId,
  type LogEntry,
} from '../src/index.js';

function capture(): { entries: LogEntry[]; stop: () => void } {
  const entries: LogEntry[] = [];
  const stop = subscribeToLogs(entry => {
    entries.push(entry);
  });
  return { entries, stop };
}

describe('Logger', () => {
  const initial = logger.getConfig();

  afterEach(() => {
    configureLogger({ ...initial, metadata: undefined });
  });

  // ═══════════════════════════════════════════════════════════════════
  // SUBSCRIBERS
  // ═══════════════════════════════════════════════════════════════════

  describe('subscribers', () => {
    it('should receive every entry at or above the level', () => {
      const logs = capture();

      logger.info('Reward issued', { rewardId: 'r1' });
      logger.error('Lock lost');

      logs.stop();
      expect(logs.entries.map(e => [e.level, e.message])).toEqual([
        ['info', 'Reward issued'],
        ['error', 'Lock lost'],
      ]);
      expect(logs.entries[0].data).toEqual({ rewardId: 'r1' });
      expect(logs.entries[1].data).toBeUndefined();
    });

    it('should stop receiving after unsubscribe', () => {
      const logs = capture();
      logs.stop();

      logger.info('ignored');

      expect(logs.entries).toEqual([]);
    });

    it('should filter below the configured level', () => {
      setLogLevel('warn');
      const logs = capture();

      logger.debug('noise');
      logger.info('noise');
      logger.warn('kept');

      logs.stop();
      expect(logs.entries.map(e => e.message)).toEqual(['kept']);
    });

    it('should tag entries with the service name', () => {
      configureLogger({ service: 'loyalty-service' });
      const logs = capture();

      logger.info('hello');

      logs.stop();
      expect(logs.entries[0].service).toBe('loyalty-service');
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // CONTEXT
  // ═══════════════════════════════════════════════════════════════════

  it('should merge child logger metadata into each entry', () => {
    const logs = capture();
    const child = createChildLogger({ component: 'wallet-ledger' });

    child.warn('Low balance', { playerId: 'p1' });

    logs.stop();
    expect(logs.entries[0]).toMatchObject({
      level: 'warn',
      message: 'Low balance',
      data: { component: 'wallet-ledger', playerId: 'p1' },
    });
  });

  it('should carry the correlation id across awaits', async () => {
    const logs = capture();

    await withCorrelationId('corr-1', async () => {
      await Promise.resolve();
      logger.info('inside');
    });
    logger.info('outside');

    logs.stop();
    expect(logs.entries[0].correlationId).toBe('corr-1');
    expect(logs.entries[1].correlationId).toBeUndefined();
  });

  // ═══════════════════════════════════════════════════════════════════
  // FORMATS
  // ═══════════════════════════════════════════════════════════════════

  describe('formatLogLine', () => {
    it('should write JSON lines', () => {
      configureLogger({ format: 'json', timestamp: false, service: 'test-svc' });

      expect(formatLogLine('info', 'Hello', { playerId: 'p1' })).toBe(
        '{"level":"info","service":"test-svc","message":"Hello","playerId":"p1"}',
      );
    });

    it('should write text lines', () => {
      configureLogger({ format: 'text', timestamp: false, service: 'test-svc' });

      expect(formatLogLine('warn', 'Low balance', { playerId: 'p1' })).toBe(
        '[WARN] [test-svc] Low balance {"playerId":"p1"}',
      );
      expect(formatLogLine('error', 'Down')).toBe('[ERROR] [test-svc] Down');
    });

    it('should add static metadata to JSON lines', () => {
      configureLogger({ format: 'json', timestamp: false, service: '', metadata: { region: 'eu' } });

      expect(formatLogLine('debug', 'tick')).toBe('{"level":"debug","message":"tick","region":"eu"}');
    });
  });
});
