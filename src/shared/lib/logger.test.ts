import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger, setLoggerOptions } from './logger.js';

function lastLine(spy: { mock: { calls: unknown[][] } }): string {
  return String(spy.mock.calls.at(-1)?.[0] ?? '');
}

describe('logger', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLoggerOptions({ level: 'info' });
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    setLoggerOptions({});
  });

  it('writes level, message and data as one text line', () => {
    logger.info('Adapter attached', { steps: 3 });
    expect(lastLine(stderrSpy)).toBe('[info] Adapter attached {"steps":3}\n');
  });

  it('colours warnings', () => {
    logger.warn('Metrics sink failed');
    expect(lastLine(stderrSpy)).toBe('\x1b[33m[warn]\x1b[0m Metrics sink failed\n');
  });

  it('suppresses debug messages at info level', () => {
    logger.debug('Adapter training step');
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it('shows debug messages when level is debug', () => {
    setLoggerOptions({ level: 'debug' });
    logger.debug('Adapter training step', { loss: 0.5 });
    expect(lastLine(stderrSpy)).toContain('[debug]\x1b[0m Adapter training step {"loss":0.5}');
  });

  it('emits structured JSON in json mode', () => {
    setLoggerOptions({ json: true });
    logger.error('Unexpected failure', { state: 'training' });

    const parsed: unknown = JSON.parse(lastLine(stderrSpy));
    expect(parsed).toMatchObject({ level: 'error', message: 'Unexpected failure', state: 'training' });
  });

  describe('child logger', () => {
    it('merges its fields under the call data', () => {
      const child = logger.child({ component: 'adaptation', requestId: 'req-1' });
      child.info('fell back', { requestId: 'req-2' });
      expect(lastLine(stderrSpy)).toBe('[info] fell back {"component":"adaptation","requestId":"req-2"}\n');
    });

    it('nests fields across generations', () => {
      logger.child({ component: 'adaptation' }).child({ stage: 'gating' }).info('gate');
      expect(lastLine(stderrSpy)).toBe('[info] gate {"component":"adaptation","stage":"gating"}\n');
    });

    it('picks up the options set before it was created', () => {
      setLoggerOptions({ level: 'debug' });
      logger.child({ component: 'training' }).debug('step');
      expect(stderrSpy).toHaveBeenCalledOnce();
    });
  });
});
