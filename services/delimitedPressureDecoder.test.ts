import { describe, it, expect } from 'vitest';
import { Effect, Either } from 'effect';
import {
  decodeDelimitedPressureText,
  detectColumns,
  detectDelimiter,
  firstInteger,
  splitDelimitedLine,
} from './delimitedPressureDecoder';

const decode = (text: string) => Effect.runSync(Effect.either(decodeDelimitedPressureText(text, 'bp.csv')));

describe('splitDelimitedLine', () => {
  it('keeps delimiters inside quotes', () => {
    expect(splitDelimitedLine('a,"b,c",d', ',')).toEqual(['a', 'b,c', 'd']);
  });

  it('unescapes doubled quotes', () => {
    expect(splitDelimitedLine('"say ""hi""";x', ';')).toEqual(['say "hi"', 'x']);
  });

  it('keeps empty cells', () => {
    expect(splitDelimitedLine('1,,3,', ',')).toEqual(['1', '', '3', '']);
  });
});

describe('detectDelimiter', () => {
  it('picks the most frequent delimiter in the header', () => {
    expect(detectDelimiter('a;b;c')).toBe(';');
    expect(detectDelimiter('a\tb\tc')).toBe('\t');
    expect(detectDelimiter('a,b;c,d')).toBe(',');
  });

  it('defaults to a comma', () => {
    expect(detectDelimiter('single')).toBe(',');
  });
});

describe('detectColumns', () => {
  it('finds English and Spanish headers in any order', () => {
    expect(detectColumns(['Pulso', 'Diastólica', 'Fecha', 'Sistólica', 'Hora'])).toEqual({
      pulse: 0,
      diastolic: 1,
      date: 2,
      systolic: 3,
      time: 4,
    });
  });

  it('does not read "timestamp" as a time column', () => {
    expect(detectColumns(['Timestamp', 'SYS', 'DIA'])).toEqual({ date: 0, systolic: 1, diastolic: 2 });
  });
});

describe('firstInteger', () => {
  it('reads the leading number of a cell', () => {
    expect(firstInteger('120 mmHg')).toBe(120);
    expect(firstInteger('')).toBeUndefined();
    expect(firstInteger(undefined)).toBeUndefined();
  });
});

describe('decodeDelimitedPressureText', () => {
  it('decodes a comma-separated export', () => {
    const result = decode('Date,Systolic,Diastolic,Pulse\r\n2025-01-05 08:00,120,80,70\r\n');
    expect(Either.isRight(result) && result.right).toEqual([
      { systolic: 120, diastolic: 80, pulse: 70, rawDateText: '2025-01-05 08:00' },
    ]);
  });

  it('joins separate date and time columns', () => {
    const text = ['Fecha;Hora;Sistólica (mmHg);Diastólica (mmHg);Pulso', '05/01/2025;08:00;135 mmHg;85;72'].join('\n');
    const result = decode(text);
    expect(Either.isRight(result) && result.right).toEqual([
      { systolic: 135, diastolic: 85, pulse: 72, rawDateText: '05/01/2025 08:00' },
    ]);
  });

  it('handles quoted cells and missing optional columns', () => {
    const text = ['Date,SYS,DIA,Notes', '"2025-01-05 08:00",118,79,"felt fine, ""rested"""'].join('\n');
    const result = decode(text);
    expect(Either.isRight(result) && result.right).toEqual([
      { systolic: 118, diastolic: 79, pulse: undefined, rawDateText: '2025-01-05 08:00' },
    ]);
  });

  it('leaves blank values for the extractor to judge', () => {
    const result = decode('Date,Systolic,Diastolic\n,,80\n\n');
    expect(Either.isRight(result) && result.right).toEqual([
      { systolic: undefined, diastolic: 80, pulse: undefined, rawDateText: undefined },
    ]);
  });

  it('fails without systolic and diastolic columns', () => {
    const result = decode('Date,Systolic,Pulse\n2025-01-05 08:00,120,70');
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe('FileDecodeError');
      expect(result.left.message).toBe('Failed to decode bp.csv: Header has no systolic or no diastolic column');
    }
  });

  it('fails on an empty file', () => {
    const result = decode('\n\n');
    expect(Either.isLeft(result) && result.left.reason).toBe('File is empty');
  });
});
