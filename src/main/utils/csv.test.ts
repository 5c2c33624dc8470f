import { describe, it, expect } from 'vitest';
import { parseCsv, toCsvField, toCsvLine } from './csv.js';

describe('toCsvLine', () => {
  it('quotes only fields that need it', () => {
    expect(toCsvLine(['a', 1, undefined, 'x,y', 'say "hi"'])).toBe('a,1,,"x,y","say ""hi"""\n');
  });

  it('quotes line breaks', () => {
    expect(toCsvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('parseCsv', () => {
  it('handles quotes, escaped quotes and embedded newlines', () => {
    const text = 'a,b\n"x,y","say ""hi"""\r\n"multi\nline",\n';
    expect(parseCsv(text)).toEqual([
      ['a', 'b'],
      ['x,y', 'say "hi"'],
      ['multi\nline', '']
    ]);
  });

  it('reads a final row without a trailing newline', () => {
    expect(parseCsv('a,b\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2']
    ]);
  });

  it('strips a byte order mark', () => {
    expect(parseCsv('\uFEFFa\n')).toEqual([['a']]);
  });

  it('reads back what toCsvLine writes', () => {
    const values = ['2024-01-02T03:04:05', 'failed', 'https://h/p?a=1,2', 'err "x"\nmore'];
    expect(parseCsv(toCsvLine(values))).toEqual([values]);
  });
});
