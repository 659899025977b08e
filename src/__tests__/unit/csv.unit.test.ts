/**
 * Unit Tests — CSV helpers
 */
import { escapeCsv, joinCsvRow, toCsv } from '@shared/csv';

describe('escapeCsv()', () => {
  it('should leave plain values bare', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv(4.5)).toBe('4.5');
  });

  it('should render null and undefined as empty', () => {
    expect(escapeCsv(null)).toBe('');
    expect(escapeCsv(undefined)).toBe('');
  });

  it('should quote values with commas, line breaks or edge whitespace', () => {
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('line\nbreak')).toBe('"line\nbreak"');
    expect(escapeCsv('cr\rhere')).toBe('"cr\rhere"');
    expect(escapeCsv(' padded')).toBe('" padded"');
    expect(escapeCsv('padded ')).toBe('"padded "');
  });

  it('should double embedded quotes', () => {
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
  });
});

describe('toCsv()', () => {
  it('should write a header line and one line per row, newline-terminated', () => {
    expect(toCsv(['a', 'b'], [[1, 'x,y'], [null, 'z']])).toBe('a,b\n1,"x,y"\n,z\n');
  });

  it('should join a row with commas', () => {
    expect(joinCsvRow(['a', null, 3])).toBe('a,,3');
  });
});
