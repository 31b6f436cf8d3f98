import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConfigurationError,
  FileDecodeError,
  IssueCollector,
  ReportWriteError,
  RunTimeoutError,
  SourceError,
} from './errors';

describe('IssueCollector', () => {
  let collector: IssueCollector;

  beforeEach(() => {
    collector = new IssueCollector();
  });

  describe('add', () => {
    it('should add a warning with its file', () => {
      collector.warn('UNPARSEABLE_ROW', 'Row 3: missing measurement date', 'bp.csv');

      expect(collector.count()).toBe(1);
      expect(collector.getAll()[0]).toEqual({
        severity: 'warning',
        code: 'UNPARSEABLE_ROW',
        message: 'Row 3: missing measurement date',
        file: 'bp.csv',
      });
    });

    it('should leave out the file key when none is given', () => {
      collector.info('NO_PRESSURE_SOURCE', 'No pressure export found for this patient');

      expect(Object.keys(collector.getAll()[0])).toEqual(['severity', 'code', 'message']);
    });

    it('should keep insertion order across addAll', () => {
      collector.info('IGNORED_SOURCE', 'first');
      collector.addAll([{ severity: 'warning', code: 'OUT_OF_RANGE', message: 'second' }]);

      expect(collector.getAll().map((i) => i.message)).toEqual(['first', 'second']);
    });
  });

  describe('fromError', () => {
    it('should record a decode failure as an error issue on that file', () => {
      collector.fromError(
        'FILE_DECODE_FAILED',
        new FileDecodeError({ file: 'ecg.txt', reason: 'EACCES', suggestion: 'Check permissions.' })
      );

      expect(collector.hasErrors()).toBe(true);
      expect(collector.getAll()[0]).toEqual({
        severity: 'error',
        code: 'FILE_DECODE_FAILED',
        message: 'Failed to decode ecg.txt: EACCES',
        file: 'ecg.txt',
      });
    });

    it('should use the location of a source error', () => {
      collector.fromError('SOURCE_UNAVAILABLE', new SourceError({ location: 'data/P1', reason: 'ENOENT' }));

      expect(collector.getAll()[0]?.file).toBe('data/P1');
    });
  });

  it('should not report errors for warnings only', () => {
    collector.warn('OUT_OF_RANGE', 'high');
    expect(collector.hasErrors()).toBe(false);
  });

  it('should return a copy from getAll', () => {
    collector.warn('OUT_OF_RANGE', 'high');
    collector.getAll().pop();
    expect(collector.count()).toBe(1);
  });

  it('should clear all issues', () => {
    collector.warn('OUT_OF_RANGE', 'high');
    collector.clear();
    expect(collector.count()).toBe(0);
  });
});

describe('service errors', () => {
  it('marks configuration and timeout errors as fatal', () => {
    expect(new ConfigurationError({ message: 'bad' }).recoverable).toBe(false);
    expect(new RunTimeoutError({ timeoutMs: 10 }).recoverable).toBe(false);
  });

  it('marks per-file and per-report failures as recoverable', () => {
    expect(new FileDecodeError({ file: 'f', reason: 'r', suggestion: 's' }).recoverable).toBe(true);
    expect(new SourceError({ location: 'l', reason: 'r' }).recoverable).toBe(true);
    expect(new ReportWriteError({ location: 'l', reason: 'r' }).recoverable).toBe(true);
  });

  it('serialises with tag and message', () => {
    const json = new RunTimeoutError({ timeoutMs: 250 }).toJSON();
    expect(json).toMatchObject({
      _tag: 'RunTimeoutError',
      message: 'Monitoring run exceeded 250ms',
      timeoutMs: 250,
      recoverable: false,
    });
  });
});
