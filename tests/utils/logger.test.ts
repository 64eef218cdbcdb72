/**
 * Tests for the structured logger
 *
 * Tests cover:
 * - Component loggers and child context
 * - Level filtering
 * - Secret redaction (proxy credentials, model API keys)
 * - Error serialization
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { configureLogger, logger } from '../../src/utils/logger.js';

describe('Logger', () => {
  let output: string[];
  let restoreStderr: () => void;

  beforeEach(() => {
    output = [];
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      output.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
      return true;
    });
    restoreStderr = () => spy.mockRestore();
    configureLogger({ level: 'debug', prettyPrint: false });
  });

  afterEach(() => {
    configureLogger({ level: 'silent' });
    restoreStderr();
  });

  function lines(): Array<Record<string, unknown>> {
    return output.map((line) => JSON.parse(line));
  }

  it('writes one JSON line per entry with the component name', () => {
    logger.recordStore.info('Reusing stored search', { rows: 12 });

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatchObject({
      level: 'info',
      service: 'flight-advisor',
      component: 'RecordStore',
      msg: 'Reusing stored search',
      rows: 12,
    });
  });

  it('carries child context on every entry', () => {
    const log = logger.extractor.child({ url: 'http://localhost:9999/search?tfs=x' });
    log.debug('Navigating');
    log.warn('Slow page');

    expect(lines().map((line) => [line.level, line.url])).toEqual([
      ['debug', 'http://localhost:9999/search?tfs=x'],
      ['warn', 'http://localhost:9999/search?tfs=x'],
    ]);
  });

  it('drops entries below the configured level', () => {
    configureLogger({ level: 'warn' });

    logger.filter.debug('Filtered flights');
    logger.filter.info('Filtered flights');
    logger.filter.warn('Nothing parsed');

    expect(lines().map((line) => line.msg)).toEqual(['Nothing parsed']);
  });

  it('redacts proxy credentials and API keys', () => {
    logger.browser.info('Launching', {
      proxy: { server: 'http://proxy.local:8080', username: 'test-user', password: 'test-secret' },
    });
    logger.advisor.debug('Configured', { recommender: { apiKey: 'test-secret', model: 'test-model' } });

    const [launch, configured] = lines();
    expect(launch.proxy).toEqual({
      server: 'http://proxy.local:8080',
      username: '[REDACTED]',
      password: '[REDACTED]',
    });
    expect(configured.recommender).toEqual({ apiKey: '[REDACTED]', model: 'test-model' });
  });

  it('serializes errors', () => {
    logger.recommender.error('Model call failed', { error: new Error('503 Service Unavailable') });
    logger.recommender.error('Odd failure', { error: 'plain text' });

    const [first, second] = lines();
    expect(first.err).toMatchObject({ name: 'Error', message: '503 Service Unavailable' });
    expect(second.err).toMatchObject({ message: 'plain text' });
  });

  it('adds the elapsed time to timed entries', () => {
    logger.advisor.timed('Loaded flights', Date.now() - 5, { rows: 3 });

    const [line] = lines();
    expect(line.rows).toBe(3);
    expect(line.durationMs).toBeGreaterThanOrEqual(5);
  });

  it('creates loggers for other components', () => {
    logger.create('Custom').info('hello');

    expect(lines()[0]).toMatchObject({ component: 'Custom', msg: 'hello' });
  });
});
