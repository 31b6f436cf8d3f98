import { describe, it, expect, vi, afterEach } from 'vitest';
import { Effect } from 'effect';
import { ConfigurationError, FileDecodeError } from './errors';
import { isRecoverable, redactValue, runSync, runSyncResult, serializeError } from './runtime';

describe('redactValue', () => {
  it('keeps short single-line strings', () => {
    expect(redactValue('report_saved')).toBe('report_saved');
  });

  it('redacts multi-line and long strings', () => {
    expect(redactValue('Patient: Jane Roe\nECG')).toBe('[REDACTED]');
    expect(redactValue('x'.repeat(121))).toBe('[REDACTED]');
  });

  it('redacts document fields by key, recursively', () => {
    expect(
      redactValue({ file: 'ecg.txt', extractedText: 'short', nested: [{ rawDateText: '2025-01-05' }] })
    ).toEqual({ file: 'ecg.txt', extractedText: '[REDACTED]', nested: [{ rawDateText: '[REDACTED]' }] });
  });
});

describe('AppLogger', () => {
  const previous = process.env.LOG_LEVEL;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  it('writes one redacted JSON line per entry', () => {
    process.env.LOG_LEVEL = 'warn';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    runSync(
      Effect.logWarning('report_not_saved').pipe(
        Effect.annotateLogs({ location: 'reports/r.json', extractedText: 'Jane Roe' })
      )
    );

    expect(warn).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warn.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'WARN',
      message: 'report_not_saved',
      location: 'reports/r.json',
      extractedText: '[REDACTED]',
    });
  });

  it('drops entries below the configured level', () => {
    process.env.LOG_LEVEL = 'error';
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    runSync(Effect.logInfo('patient_extracted'));

    expect(info).not.toHaveBeenCalled();
  });
});

describe('runSyncResult', () => {
  it('wraps success and failure without throwing', () => {
    expect(runSyncResult(Effect.succeed(3))).toEqual({ success: true, data: 3 });

    const failed = runSyncResult(Effect.fail(new ConfigurationError({ message: 'bad' })));
    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(isRecoverable(failed.error)).toBe(false);
      expect(serializeError(failed.error)).toMatchObject({ _tag: 'ConfigurationError', message: 'bad' });
    }
  });

  it('reports per-file failures as recoverable', () => {
    expect(isRecoverable(new FileDecodeError({ file: 'f', reason: 'r', suggestion: 's' }))).toBe(true);
  });
});
